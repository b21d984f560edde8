export { default as logger, Logging } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export type { ValidatedHandler } from './asyncHandler';
export { AppError } from './AppError';
export type { ValidationIssue } from './AppError';
