import { lookup } from "node:dns/promises";
import { ExtractorConfig } from "../config";
import { ExtractionError, isExtractionError } from "../errors";
import { TargetURL } from "../types";
import { withTimeout } from "./budget";
import { isBlockedAddress, isIpLiteral, normalizeIpLiteral } from "./network";

export type HostResolver = (host: string) => Promise<string[]>;

export type DomainPolicy = ExtractorConfig["domainPolicy"];

export const systemResolver: HostResolver = async (host) => {
  const records = await lookup(host, { all: true, verbatim: true });
  return records.map((record) => record.address);
};

const INTERNAL_HOST_SUFFIXES = [".localhost", ".local", ".internal", ".home.arpa", ".lan", ".intranet"];
const METADATA_HOSTS = new Set([
  "localhost",
  "metadata",
  "metadata.google.internal",
  "metadata.goog",
  "instance-data",
  "instance-data.ec2.internal"
]);
const NOT_FOUND_CODES = new Set(["ENOTFOUND", "ENODATA", "EAI_NONAME", "ENONAME", "EAI_NODATA"]);
const TIMEOUT_CODES = new Set(["ETIMEOUT", "ETIMEDOUT", "EAI_AGAIN"]);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** `*.example.com` matches subdomains only; `example.com` matches itself and its subdomains. */
export function hostMatches(host: string, pattern: string): boolean {
  if (pattern.startsWith("*.")) {
    return host.endsWith(pattern.slice(1));
  }
  return host === pattern || host.endsWith(`.${pattern}`);
}

function isInternalName(host: string): boolean {
  return METADATA_HOSTS.has(host) || INTERNAL_HOST_SUFFIXES.some((suffix) => host.endsWith(suffix));
}

export interface ValidateOptions {
  /** Caller's remaining budget; DNS waits for the smaller of this and the configured DNS timeout. */
  timeoutMs?: number;
}

export class UrlValidator {
  private readonly allowedIps: Set<string>;

  constructor(
    private readonly policy: DomainPolicy,
    private readonly resolver: HostResolver = systemResolver
  ) {
    this.allowedIps = new Set(policy.allowedIps.map((address) => normalizeIpLiteral(address)));
  }

  isAllowlisted(host: string): boolean {
    return this.policy.allowedDomains.some((pattern) => hostMatches(host, pattern));
  }

  async validate(rawUrl: string, options: ValidateOptions = {}): Promise<TargetURL> {
    const trimmed = rawUrl.trim();
    if (!trimmed) {
      throw new ExtractionError("InvalidURL", "url is empty");
    }
    if (trimmed.length > this.policy.maxUrlLength) {
      throw new ExtractionError("InvalidURL", `url exceeds ${this.policy.maxUrlLength} characters`);
    }

    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      throw new ExtractionError("InvalidURL", "url could not be parsed");
    }

    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new ExtractionError("InvalidURL", `unsupported scheme ${parsed.protocol}`);
    }
    if (parsed.username || parsed.password) {
      throw new ExtractionError("InvalidURL", "credentials in url are not allowed");
    }

    const host = parsed.hostname.toLowerCase().replace(/\.$/, "");
    if (!host) {
      throw new ExtractionError("InvalidURL", "url has no host");
    }

    if (isIpLiteral(host)) {
      return this.validateLiteral(parsed, host);
    }

    if (isInternalName(host)) {
      throw new ExtractionError("ForbiddenHost", `host ${host} is internal`, { host });
    }

    const allowlisted = this.isAllowlisted(host);
    if (!allowlisted) {
      if (this.policy.mode === "allowlist") {
        throw new ExtractionError("ForbiddenHost", `host ${host} is not on the allowlist`, { host });
      }
      if (!host.includes(".")) {
        throw new ExtractionError("ForbiddenHost", `single-label host ${host} is not allowed`, { host });
      }
      if (this.policy.deniedDomains.some((pattern) => hostMatches(host, pattern))) {
        throw new ExtractionError("ForbiddenHost", `host ${host} is denylisted`, { host });
      }
    }

    const addresses = await this.resolve(host, options);
    const blocked = addresses.find((address) => isBlockedAddress(address));
    if (blocked) {
      throw new ExtractionError("ForbiddenHost", `host ${host} resolves to a blocked address`, { host, address: blocked });
    }

    return { url: parsed.href, host, addresses, allowlisted };
  }

  private validateLiteral(parsed: URL, host: string): TargetURL {
    const address = normalizeIpLiteral(host);
    if (!this.allowedIps.has(address)) {
      throw new ExtractionError("ForbiddenHost", `ip literal ${address} is not allowed`, { host: address });
    }
    if (isBlockedAddress(address)) {
      throw new ExtractionError("ForbiddenHost", `ip literal ${address} is in a blocked range`, { host: address });
    }
    return { url: parsed.href, host: address, addresses: [address], allowlisted: true };
  }

  private async resolve(host: string, options: ValidateOptions): Promise<string[]> {
    const timeoutMs = Math.min(this.policy.dnsTimeoutMs, options.timeoutMs ?? Number.POSITIVE_INFINITY);
    if (timeoutMs <= 0) {
      throw new ExtractionError("Timeout", "no time left to resolve host", { host });
    }

    let addresses: string[];
    try {
      addresses = await withTimeout(this.resolver(host), timeoutMs, `dns lookup for ${host}`);
    } catch (error) {
      if (isExtractionError(error)) {
        throw error;
      }
      const code = errorCode(error);
      if (code && NOT_FOUND_CODES.has(code)) {
        throw new ExtractionError("InvalidURL", `host ${host} does not resolve`, { host, code });
      }
      if (code && TIMEOUT_CODES.has(code)) {
        throw new ExtractionError("Timeout", `dns lookup for ${host} timed out`, { host, code });
      }
      const message = error instanceof Error ? error.message : "dns lookup failed";
      throw new ExtractionError("TransportError", message, { host, code });
    }

    if (addresses.length === 0) {
      throw new ExtractionError("InvalidURL", `host ${host} has no addresses`, { host });
    }
    return addresses;
  }
}
