/**
 * Collection loader configuration
 */
export interface CollectionLoaderConfiguration {
  /** Identifier stamped on every emitted event */
  loaderId: string;

  /** Log page load lifecycle lines with console.debug */
  debug: boolean;
}

/**
 * Default collection loader configuration
 */
export const DEFAULT_LOADER_CONFIG: CollectionLoaderConfiguration = {
  loaderId: 'default',
  debug: false,
};
