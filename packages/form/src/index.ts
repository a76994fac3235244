// Display buffer and layout
export * from "./buffer";
// Line and segment allocation
export * from "./coordinator";
// Conditional visibility
export * from "./dependency";
// Element contract
export * from "./element";
export * from "./elements/literal";
export * from "./elements/text-input";
export * from "./errors";
// Form driver
export * from "./form";
export * from "./id";
// Key decoding
export * from "./keys";
export * from "./layout";
export * from "./line";
export * from "./step";
export * from "./style";
// Terminal interface and implementations
export * from "./terminal";
export * from "./text";
// Utilities
export * from "./utils";
