export { CommandSet, type CommandEntry, type CommandResolution } from "./command-set";
export {
  backgroundContext,
  responseWriterFromContext,
  valueFrom,
  withAdapter,
  withCancel,
  withValue,
  type HandlerContext,
} from "./context";
export {
  hasSubCommands,
  isBackgroundHandler,
  isCommandHandler,
  isHearsHandler,
  isRawHandler,
  isWebHookHandler,
  newBackgroundHandler,
  newCommandHandler,
  newHearsHandler,
  newRawHandler,
  newWebHookHandler,
  type BackgroundFunc,
  type BackgroundHandler,
  type CommandFunc,
  type CommandHandler,
  type CommandWithSubsHandler,
  type Handler,
  type HeardFunc,
  type HearsHandler,
  type RawFunc,
  type RawHandler,
  type WebHookFunc,
  type WebHookHandler,
} from "./handler";
export { findSubmatches, runBackgroundHandler, runCommandHandler, runHearsHandler, runRawHandler } from "./invoke";
export { Dispatcher, loop, type DispatchState } from "./loop";
export { Message, type MessageInit } from "./message";
export { messagesReceived, messagesSent, metricsRegistry } from "./metrics";
export { Mux, type MuxOptions } from "./mux";
export {
  badCli,
  CommandError,
  deferToSubCommands,
  fail,
  skipRemaining,
  success,
  unknownCommand,
  usageRequested,
  type CommandErrorKind,
  type CommandOutcome,
} from "./outcome";
export {
  newNullResponseWriter,
  newResponseWriter,
  type ResponseWriter,
} from "./response-writer";
export { tokenize } from "./shellwords";
export { renderUsage } from "./usage";
