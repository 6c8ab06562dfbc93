/**
 * Module search path as an explicit value. Rebinding produces a new
 * config; nothing process-wide is mutated.
 */
export interface ResolverConfig {
  readonly searchPath: readonly string[];
}

export function createResolverConfig(searchPath: readonly string[]): ResolverConfig {
  return { searchPath: [...searchPath] };
}

/**
 * Put `entry` first, dropping any later copies of it
 */
export function prependSearchPath(config: ResolverConfig, entry: string): ResolverConfig {
  return {
    searchPath: [entry, ...config.searchPath.filter((existing) => existing !== entry)]
  };
}

export function hasSearchPathEntry(config: ResolverConfig, entry: string): boolean {
  return config.searchPath.includes(entry);
}
