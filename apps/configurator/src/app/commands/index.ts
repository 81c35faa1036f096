export type { CommandContext, CommandHandler } from "./command"
export { type CommandTable, commandHandlers, type DispatchOptions, dispatch } from "./dispatch"
