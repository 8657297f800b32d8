export { InvalidCredentialsException } from './invalid-credentials.exception';
