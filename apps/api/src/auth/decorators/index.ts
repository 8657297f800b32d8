export { CurrentUser } from './current-user.decorator';
