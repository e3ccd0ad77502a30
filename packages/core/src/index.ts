export * from "./dir";
export * from "./environment";
export * from "./resolver";
export * from "./roles";
export * from "./shortcuts";
