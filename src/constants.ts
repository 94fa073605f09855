/** Porkbun JSON API base URL */
export const PORKBUN_API = 'https://porkbun.com/api/json/v3';

/** Status value Porkbun uses for a successful response */
export const PORKBUN_SUCCESS = 'SUCCESS';

/** TTL (seconds) of the records published for each domain */
export const DDNS_TTL = 300;

/** Record name for the bare domain */
export const APEX_NAME = '@';

/** Record name matching any undefined subdomain */
export const WILDCARD_NAME = '*';

/** Per-request timeout when none is configured */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Largest delay a Node.js timer accepts (2^31 - 1 ms) */
export const MAX_TIMEOUT_MS = 2_147_483_647;
