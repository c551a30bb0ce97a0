/**
 * Shared HTTP plumbing for the odds and stats clients
 */

import fetch from "node-fetch";
import type { RequestInit, Response } from "node-fetch";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

/**
 * Build a URL with query parameters appended
 */
export function buildUrl(base: string, path: string, params: Record<string, string | number>): string {
  const url = new URL(`${base.replace(/\/+$/, "")}${path}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}
