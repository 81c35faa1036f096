export { abortOnSignals, type SignalScope } from "./abort-on-signals"
export { type CommandLine, createProgram, helpText, type Invocation, parseCommandLine } from "./program"
