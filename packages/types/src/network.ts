/**
 * Supported networks.
 *
 * Each network has its own webhook path (`POST /webhooks/{network}`).
 */

export type Network = "eth" | "btc" | "sol" | "ltc";

export const NETWORKS: readonly Network[] = ["eth", "btc", "sol", "ltc"];
