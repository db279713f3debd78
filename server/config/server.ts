/**
 * Server Configuration
 *
 * HTTP-level constants that are not worth an environment variable.
 */

/** Express body parser size limit; moves and signups are tiny */
export const BODY_PARSE_LIMIT = "100kb";

/** How long to wait for open connections to drain on shutdown */
export const SHUTDOWN_GRACE_MS = 10_000;
