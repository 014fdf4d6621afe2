/**
 * Middleware Index
 */
export { corsConfig, isOriginAllowed } from "./cors.js";
