export { ValidationCapability, checkBusinessRules } from './validator';
export type { FieldError, PartialModel } from './validator';
