// Commands Module Index
// Re-exports all command registration functions

export { registerBackupCommands } from "./backup";
export { registerPullCommands } from "./pull";
export { registerSkipCommands } from "./skip";
