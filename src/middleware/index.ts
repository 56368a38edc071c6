export { validate, validationErrorBody, schemas } from "./validation.js";
export { logger, requestLogger } from "./logging.js";
export { createTokenGuard, requirePublishToken } from "./auth.js";
