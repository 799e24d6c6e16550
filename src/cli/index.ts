/**
 * CLI module, a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerListCommand,
  registerRunCommand,
  registerVerifyCommand,
  registerHintCommand,
  registerResetCommand,
  registerPendingCommand,
} from './run.js';
