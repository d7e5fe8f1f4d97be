// Centralized site registry and categories

import type { SiteAdapter } from "../core/types/index";
import { adapter as cdon } from "./cdon/adapter";

// 1) Adapters dictionary (single source of truth for site keys)
const adapters = {
  cdon,
} as const;

export type RegistryKey = keyof typeof adapters;

export const DEFAULT_SITE: SiteAdapter = cdon;

// 2) Registry map derived from adapters dictionary
export const registry = new Map<string, SiteAdapter>(Object.entries(adapters));

export function getSiteKeys(): string[] {
  return [...registry.keys()];
}

/**
 * Resolves a category key ("bluray", "4k") or "all" to category URLs
 * @returns Pairs of [key, url]; empty when the key is unknown
 */
export function resolveCategories(
  key: string,
  site: SiteAdapter = DEFAULT_SITE,
): Array<[string, string]> {
  if (key === "all") return Object.entries(site.categories);
  const url = site.categories[key];
  return url ? [[key, url]] : [];
}

export function getCategoryKeys(site: SiteAdapter = DEFAULT_SITE): string[] {
  return Object.keys(site.categories);
}
