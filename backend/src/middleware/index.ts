/**
 * Middleware exports
 */

export {
  errorHandler,
  asyncHandler,
  notFoundHandler,
} from "./error-handler.js";
