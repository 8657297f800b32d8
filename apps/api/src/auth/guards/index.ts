export { BearerAuthGuard } from './bearer-auth.guard';
