/**
 * Controller exports.
 */

export { ApiController, fullModelName } from './api-controller.js';
export { responseText, functionCalls, ensureCandidates } from './response.js';
export { isBlocked, primaryRating, getSafetySummary, type SafetySummary } from './safety.js';
