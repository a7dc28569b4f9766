import type { LogHandler, LogLevel } from "../core/logger/types";
import type { WeakFailurePolicy } from "../core/registry/enums";
import type { ListenerFailure } from "../core/registry/types";

export type DefineRegistryInput = {
    /** Log code and console tag. Default `"holdfast"`. */
    name?: string;
    logger?: {
        level?: LogLevel;
        /** Install the console handler. Default `true`. */
        console?: boolean;
        handlers?: readonly LogHandler[];
    };
    weakFailurePolicy?: WeakFailurePolicy;
    onListenerFailure?: (failure: ListenerFailure) => void;
};

export type RegistryDefinition = {
    readonly name: string;
    readonly logger: {
        readonly level: LogLevel;
        readonly console: boolean;
        readonly handlers: readonly LogHandler[];
    };
    readonly weakFailurePolicy: WeakFailurePolicy;
    readonly onListenerFailure?: (failure: ListenerFailure) => void;
};
