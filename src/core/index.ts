/**
 * Core entrypoint: exports the request builder and the result stage.
 * Import from here if you only need the builder without error helpers.
 * @module
 */

/**
 * Fluent builder for a single outbound HTTP request, and its factory.
 */
export { newRequest, RequestBuilder } from './request.js';

/**
 * Second stage of a request that reads and decodes the response body.
 */
export { type Decoder, ResultRequest, type SendOutcome } from './result.js';
