// ── Config ──────────────────────────────────────────────────────────
export { DEFAULT_REGISTRY_NAME, defineRegistry } from "./config";
export type { DefineRegistryInput, RegistryDefinition } from "./config";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LoggerOptions, LogHandler, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
// ── Errors ──────────────────────────────────────────────────────────
export { HoldfastError, SignatureMismatchError, UnknownEventError } from "./core/errors";
// ── Events ──────────────────────────────────────────────────────────
export { defineEvent, formatSignature, MAX_ARITY, sameSignature } from "./core/signature/signature";
export type {
    EventDefinition,
    EventInstance,
    EventName,
    ListenerArgs,
    ParamTypes,
    Signature,
} from "./core/signature/types";
// ── Combination ─────────────────────────────────────────────────────
export { Combination } from "./core/combination/combination";
export type { AnyListener, CombinationInstance, Listener } from "./core/combination/types";
// ── Owners ──────────────────────────────────────────────────────────
export { OwnerHandle } from "./core/owner/handle";
export { createOwner, isOwnerLive } from "./core/owner/helpers";
export { OwnerTable } from "./core/owner/owner-table";
export type { DestroyableOwner, Owner } from "./core/owner/types";
// ── Registries ──────────────────────────────────────────────────────
export { StrongRegistry } from "./core/strong/strong-registry";
export { WeakRegistry } from "./core/weak/weak-registry";
export { WeakFailurePolicy } from "./core/registry/enums";
export { createEventRegistry } from "./core/registry/helpers";
export { EventRegistry } from "./core/registry/registry";
export { OwnerScope } from "./core/registry/scope";
export type { ListenerFailure, RegistryStats } from "./core/registry/types";
// ── Maintenance ─────────────────────────────────────────────────────
export { Sweeper } from "./core/sweeper/sweeper";
export type { SweeperOptions } from "./core/sweeper/types";
