/**
 * Text Module
 *
 * Contract for the external text-generation capability plus a template
 * implementation that needs no external service.
 */

export * from "./types";
export { TemplateTextCapability, parseTermsBlock } from "./template";
export { invokeCapability, type InvokeOptions } from "./invoke";
