export { createApp, startServer, DEFAULT_PORT } from './app.js';
export { asyncHandler } from './middleware/async-handler.js';
export { errorHandler } from './middleware/error-handler.js';
