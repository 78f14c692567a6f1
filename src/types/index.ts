/**
 * Shared type foundations for the industry snapshot pipeline.
 */

export * from "./document.js";
export * from "./session.js";
export * from "./notice.js";
export * from "./outcome.js";
