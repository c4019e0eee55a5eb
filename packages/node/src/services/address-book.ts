/**
 * Address book: maps a deposit address on a network to the trade it
 * belongs to.
 *
 * The wallet side of the system owns these mappings; the webhook
 * receiver only reads them. Ethereum addresses are matched without
 * regard to case (checksummed and lower-case forms are the same
 * address); other networks match exactly.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Network } from "@escrowhook/types";
import { NETWORKS, toError } from "@escrowhook/types";
import { NetworkSchema } from "../types/dto.js";

// =============================================================================
// Interface
// =============================================================================

export interface AddressBook {
  /** @returns The trade ID, or undefined when the address is not ours */
  resolveTradeId(address: string, network: Network): Promise<string | undefined>;
}

function normalizeAddress(address: string, network: Network): string {
  const trimmed = address.trim();
  return network === "eth" ? trimmed.toLowerCase() : trimmed;
}

// =============================================================================
// File format
// =============================================================================

/**
 * { "<network>": { "<address>": "<tradeId>" } }
 */
export const AddressBookFileSchema = z.record(
  NetworkSchema,
  z.record(z.string().min(1), z.string().min(1)),
);

export type AddressBookData = z.infer<typeof AddressBookFileSchema>;

// =============================================================================
// In-memory implementation
// =============================================================================

export class InMemoryAddressBook implements AddressBook {
  private readonly _byNetwork = new Map<Network, Map<string, string>>();

  constructor(data: AddressBookData = {}) {
    for (const network of NETWORKS) {
      const entries = data[network];
      if (entries === undefined) continue;
      for (const [address, tradeId] of Object.entries(entries)) {
        this.register(network, address, tradeId);
      }
    }
  }

  register(network: Network, address: string, tradeId: string): void {
    let addresses = this._byNetwork.get(network);
    if (addresses === undefined) {
      addresses = new Map();
      this._byNetwork.set(network, addresses);
    }
    addresses.set(normalizeAddress(address, network), tradeId);
  }

  unregister(network: Network, address: string): boolean {
    return this._byNetwork.get(network)?.delete(normalizeAddress(address, network)) ?? false;
  }

  resolveTradeId(address: string, network: Network): Promise<string | undefined> {
    return Promise.resolve(
      this._byNetwork.get(network)?.get(normalizeAddress(address, network)),
    );
  }

  get size(): number {
    let total = 0;
    for (const addresses of this._byNetwork.values()) {
      total += addresses.size;
    }
    return total;
  }
}

/**
 * Load an address book from a JSON file.
 *
 * @throws Error naming the file when it cannot be read or fails validation
 */
export async function loadAddressBookFile(path: string): Promise<InMemoryAddressBook> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (e: unknown) {
    throw new Error(`Cannot read address book at ${path}: ${toError(e).message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    throw new Error(`Address book at ${path} is not valid JSON: ${toError(e).message}`);
  }

  const parsed = AddressBookFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`Invalid address book at ${path}${where}: ${issue?.message ?? "invalid"}`);
  }

  return new InMemoryAddressBook(parsed.data);
}
