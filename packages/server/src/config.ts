export type SceneNetConfig = {
  host: string;
  port: number;
  assetPort: number;
  maxPayloadLength: number;
  inlineLimit: number;
  tickMs: number;
};

export const DEFAULT_SCENENET_PORT = 50000;

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

/**
 * Reads the service settings from environment variables. Call `dotenv.config()` first to pick
 * up a `.env` file.
 */
export function loadSceneNetConfig(env: NodeJS.ProcessEnv = process.env): SceneNetConfig {
  const port = readInteger(env, "SCENENET_PORT", DEFAULT_SCENENET_PORT, 0, 65535);
  return {
    host: env.SCENENET_HOST?.trim() || "0.0.0.0",
    port,
    assetPort: readInteger(env, "SCENENET_ASSET_PORT", port === 0 ? 0 : port + 1, 0, 65535),
    maxPayloadLength: readInteger(env, "SCENENET_MAX_PAYLOAD", 100_000_000, 1, Number.MAX_SAFE_INTEGER),
    inlineLimit: readInteger(env, "SCENENET_INLINE_LIMIT", 1024, 0, Number.MAX_SAFE_INTEGER),
    tickMs: readInteger(env, "SCENENET_TICK_MS", 50, 1, 60_000),
  };
}
