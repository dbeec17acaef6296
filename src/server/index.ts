export { ApiServer, SUBMIT_ACKNOWLEDGMENT } from './express.js';
export { createValidationMiddleware, type ValidationMiddlewareOptions } from './middleware.js';
