import dns from 'node:dns';
import http from 'node:http';
import https from 'node:https';
import type { LookupFunction } from 'node:net';

import { SecurityRejectionError } from '../../errors/app-error.js';
import { IpRangeGuard } from '../../utils/ip-address.js';

type LookupCallback = Parameters<LookupFunction>[2];

export type AddressLookup = (
  hostname: string,
  options: dns.LookupAllOptions,
  callback: (
    error: NodeJS.ErrnoException | null,
    addresses: dns.LookupAddress[]
  ) => void
) => void;

const systemLookup: AddressLookup = (hostname, options, callback) => {
  dns.lookup(hostname, options, callback);
};

function createNoDnsResultsError(hostname: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(
    `No DNS results returned for ${hostname}`
  );
  error.code = 'ENODATA';
  return error;
}

function handleLookupResult(
  hostname: string,
  addresses: dns.LookupAddress[],
  useAll: boolean,
  guard: IpRangeGuard,
  callback: LookupCallback
): void {
  const blocked = addresses.find(({ address }) => guard.isBlocked(address));
  if (blocked) {
    callback(
      new SecurityRejectionError(
        `Private IP address blocked: ${blocked.address}`,
        hostname
      ),
      addresses
    );
    return;
  }

  const [first] = addresses;
  if (!first) {
    callback(createNoDnsResultsError(hostname), addresses);
    return;
  }

  if (useAll) {
    callback(null, addresses);
    return;
  }
  callback(null, first.address, first.family);
}

/**
 * Socket lookup that refuses to connect when any address of the host is in a
 * blocked range. Runs at connect time, so a name that re-resolves between the
 * safety check and the request still cannot reach a private address.
 */
export function createGuardedLookup(
  guard: IpRangeGuard = new IpRangeGuard(),
  lookup: AddressLookup = systemLookup
): LookupFunction {
  return (hostname, options, callback) => {
    lookup(hostname, { ...options, all: true }, (error, addresses) => {
      if (error) {
        callback(error, addresses);
        return;
      }
      handleLookupResult(
        hostname,
        addresses,
        options.all === true,
        guard,
        callback
      );
    });
  };
}

export interface GuardedAgents {
  readonly httpAgent: http.Agent;
  readonly httpsAgent: https.Agent;
}

export function createGuardedAgents(
  lookup: LookupFunction = createGuardedLookup()
): GuardedAgents {
  return {
    httpAgent: new http.Agent({ lookup }),
    httpsAgent: new https.Agent({ lookup }),
  };
}
