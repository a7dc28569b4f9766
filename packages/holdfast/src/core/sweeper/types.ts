export type SweeperOptions = {
    /** Croner pattern, seconds field optional, e.g. `"*\/30 * * * * *"`. */
    cron: string;
    /** IANA timezone for the pattern. Defaults to the process timezone. */
    timezone?: string;
};
