/**
 * Feed parsers
 */

export * from "./device-time.js";
export * from "./smbg.js";
