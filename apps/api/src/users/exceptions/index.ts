export { FieldConflictException } from './field-conflict.exception';
