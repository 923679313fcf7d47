export { CommandMailSession } from './command-session.js';
export type {
  CommandExecutor,
  CommandResponse,
  CommandMailSessionOptions,
  UntaggedResponse,
} from './command-session.js';
