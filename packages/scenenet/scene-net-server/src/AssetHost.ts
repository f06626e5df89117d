export type InstalledAsset = {
  // Request path relative to the host root, without a leading slash
  path: string;
  port: number;
};

/**
 * Serves large binary payloads out of band, for observers to fetch over HTTP.
 */
export type AssetHost = {
  install(identity: string, bytes: Uint8Array): InstalledAsset;
  remove(identity: string): void;
};
