/**
 * @glucose-report/tidepool
 *
 * Tidepool session client and data-response classifier
 */

export * from "./types.js";
export * from "./client.js";
export * from "./classify.js";
