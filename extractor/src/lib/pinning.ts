import { LookupAddress } from "node:dns";
import { LookupFunction, isIP } from "node:net";
import { Agent } from "undici";
import { TargetURL } from "../types";

/** The `dispatcher` slot of fetch's RequestInit. */
export type PinnedDispatcher = NonNullable<RequestInit["dispatcher"]>;

function notPinned(hostname: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`no validated address for ${hostname}`);
  error.code = "ENOTFOUND";
  return error;
}

function wantedFamily(family: unknown): 0 | 4 | 6 {
  const text = String(family ?? 0);
  if (text === "4" || text === "IPv4") {
    return 4;
  }
  if (text === "6" || text === "IPv6") {
    return 6;
  }
  return 0;
}

/**
 * DNS lookup that answers only for the validated host, and only with the addresses
 * it was validated against, so the socket cannot land on a re-resolved address.
 */
export function pinnedLookup(target: TargetURL): LookupFunction {
  const pinned: LookupAddress[] = target.addresses.map((address) => ({
    address,
    family: isIP(address) === 6 ? 6 : 4
  }));

  return (hostname, options, callback) => {
    const host = hostname.toLowerCase().replace(/\.$/, "");
    const family = wantedFamily(options.family);
    const candidates = pinned.filter((entry) => family === 0 || entry.family === family);
    if (host !== target.host || candidates.length === 0) {
      callback(notPinned(hostname), "");
      return;
    }
    if (options.all) {
      callback(null, candidates);
      return;
    }
    callback(null, candidates[0].address, candidates[0].family);
  };
}

/** One connection pool per validated hop; the caller destroys it when the hop is done. */
export function pinnedDispatcher(target: TargetURL): PinnedDispatcher {
  return new Agent({ connect: { lookup: pinnedLookup(target) } });
}
