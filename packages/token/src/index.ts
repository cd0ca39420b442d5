/**
 * @tallystake/token: Transactional token ledger.
 *
 * Composes @tallystake/ledger, @tallystake/staking and @tallystake/vesting
 * into one all-or-nothing entry surface, gated by external access control
 * and pause collaborators, with events delivered to a pluggable sink.
 */

// Coordinator
export { TokenLedger } from "./token-ledger.js";
export type { TokenLedgerOptions } from "./token-ledger.js";

// Collaborators
export { InMemoryAccessControl, SwitchPauseGate } from "./collaborators.js";
export { InMemoryEventSink } from "./event-sink.js";
export type { EventHandler, Subscription } from "./event-sink.js";

// Configuration and logging
export { ConfigSchema, loadConfig, parseRoleGrants, toTokenomicsConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

// Types
export type {
  TokenErrorCode,
  Role,
  RoleGrant,
  AccessControl,
  PauseGate,
  EventSink,
  InternalAccounts,
  TokenomicsConfig,
  TransferReceipt,
  GlobalState,
  VestingGrant,
  TokenLedgerSnapshot,
} from "./types.js";

export { TokenError } from "./types.js";
