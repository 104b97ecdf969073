export * from "./schemas/bot-state";
export * from "./schemas/volume-config";
