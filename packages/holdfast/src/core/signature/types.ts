export type EventName = string;

/** Argument lists a listener may take: zero to four parameters. */
export type ListenerArgs =
    | []
    | [unknown]
    | [unknown, unknown]
    | [unknown, unknown, unknown]
    | [unknown, unknown, unknown, unknown];

/** One type name per parameter, in order. */
export type ParamTypes<Args extends ListenerArgs> = { readonly [K in keyof Args]: string };

export interface Signature {
    readonly arity: number;
    readonly params: readonly string[];
}

/**
 * Type-erased event interface for heterogeneous collections.
 */
export interface EventInstance {
    readonly name: EventName;
    readonly signature: Signature;
}

/**
 * Public interface returned by {@link defineEvent}.
 *
 * The generic parameter carries the listener argument types; `signature`
 * carries their run-time description, which is what registries compare.
 */
export interface EventDefinition<Args extends ListenerArgs = []> extends EventInstance {
    /** @internal Phantom method for argument type extraction. Never called. */
    args(): Args;
}
