export type { RequestUser } from './request-user.interface';
