import { readFileSync } from 'node:fs';

import type { TransferConfig } from '../../config.js';
import { getErrorMessage } from '../../errors.js';
import { logWarn } from '../../observability.js';

export type TrustedRoots = string | Buffer | (string | Buffer)[];

export type TlsDecision =
  | { readonly skipVerify: true }
  | { readonly skipVerify: false; readonly ca?: TrustedRoots };

/** Per-host TLS trust: skip verification, or verify against `ca` (system roots when absent). */
export type TlsPolicy = (host: string) => TlsDecision;

function stripPort(host: string): string {
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  const colon = host.indexOf(':');
  if (colon === -1 || host.includes(':', colon + 1)) return host;
  return host.slice(0, colon);
}

function readCaBundle(file: string): Buffer | undefined {
  try {
    return readFileSync(file);
  } catch (error: unknown) {
    logWarn('Unable to read TLS CA bundle; using system roots', {
      file,
      error: getErrorMessage(error),
    });
    return undefined;
  }
}

/**
 * Builds the default policy from configuration: hosts listed in
 * `sslNoVerifyHosts` (with or without port) skip verification, every other
 * host trusts the PEM bundle at `sslCaFile` when one is configured.
 */
export function createConfigTlsPolicy(
  config: Pick<TransferConfig, 'sslNoVerifyHosts' | 'sslCaFile'>
): TlsPolicy {
  const insecureHosts = new Set(
    config.sslNoVerifyHosts.map((host) => host.toLowerCase())
  );
  let ca: Buffer | undefined;
  let caLoaded = false;

  const loadCa = (): Buffer | undefined => {
    if (!caLoaded && config.sslCaFile) {
      ca = readCaBundle(config.sslCaFile);
    }
    caLoaded = true;
    return ca;
  };

  return (host) => {
    const lowered = host.toLowerCase();
    if (insecureHosts.has(lowered) || insecureHosts.has(stripPort(lowered))) {
      return { skipVerify: true };
    }
    const roots = loadCa();
    return roots ? { skipVerify: false, ca: roots } : { skipVerify: false };
  };
}
