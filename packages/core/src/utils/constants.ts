// packages/core/src/utils/constants.ts — Shared engine constants

/** Config file looked up in the project directory */
export const CONFIG_FILENAME = '.taskloom.yml';

/** Separator between a component name and an output key */
export const OUTPUT_KEY_SEPARATOR = '.';

/** Parallel group concurrency when unbounded */
export const UNBOUNDED_CONCURRENCY = 0;
