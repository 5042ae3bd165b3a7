// ---------------------------------------------------------------------------
// Optional localhost fallback for the MongoDB URI
//
// Inside a container network the store is usually reached by service name
// (e.g. mongodb://db:27017). When the same configuration is used from a
// developer machine that name does not resolve. With the fallback enabled,
// an unresolvable host is swapped for "localhost"; otherwise the URI is used
// exactly as configured.
// ---------------------------------------------------------------------------

import { lookup } from 'node:dns/promises'

export type HostLookup = (hostname: string) => Promise<unknown>

const LOCAL_HOST = 'localhost'

/**
 * Returns the URI to connect with. Multi-host and SRV URIs are returned
 * unchanged: the driver resolves those itself.
 */
export async function resolveMongoUri(
  uri: string,
  allowLocalFallback: boolean,
  lookupHost: HostLookup = lookup,
): Promise<string> {
  if (!allowLocalFallback || !uri.startsWith('mongodb://')) return uri

  let url: URL
  try {
    url = new URL(uri)
  } catch {
    return uri
  }
  if (url.hostname === '' || url.hostname === LOCAL_HOST) return uri

  try {
    await lookupHost(url.hostname)
    return uri
  } catch {
    console.warn(`MongoDB host "${url.hostname}" did not resolve; falling back to ${LOCAL_HOST}`)
    url.hostname = LOCAL_HOST
    return url.toString()
  }
}
