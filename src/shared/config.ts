// Tool registration mode
export type McpMode = 'read' | 'write';

export interface Config {
  mode: McpMode;
  maxInputSizeMB: number;
  defaultBase64: boolean;
}

const DEFAULT_MODE: McpMode = 'write';
const DEFAULT_MAX_INPUT_SIZE_MB = 1;

/**
 * Read the configuration from environment variables, falling back to defaults with a warning on bad values
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawMode = env.DATA_URI_MCP_MODE?.toLowerCase();
  let mode: McpMode = DEFAULT_MODE; // Default to write (full functionality)
  if (rawMode === 'read' || rawMode === 'write') {
    mode = rawMode;
  } else if (rawMode) {
    console.error(`Invalid DATA_URI_MCP_MODE "${rawMode}". Using default "${DEFAULT_MODE}". Valid options: read, write`);
  }

  let maxInputSizeMB = DEFAULT_MAX_INPUT_SIZE_MB;
  if (env.DATA_URI_MAX_INPUT_SIZE_MB) {
    const parsed = parseFloat(env.DATA_URI_MAX_INPUT_SIZE_MB);
    if (Number.isFinite(parsed) && parsed > 0) {
      maxInputSizeMB = parsed;
    } else {
      console.error(`Invalid DATA_URI_MAX_INPUT_SIZE_MB "${env.DATA_URI_MAX_INPUT_SIZE_MB}". Using default ${DEFAULT_MAX_INPUT_SIZE_MB}`);
    }
  }

  const rawBase64 = env.DATA_URI_DEFAULT_BASE64?.toLowerCase();
  let defaultBase64 = true;
  if (rawBase64 === 'false' || rawBase64 === '0') {
    defaultBase64 = false;
  } else if (rawBase64 && rawBase64 !== 'true' && rawBase64 !== '1') {
    console.error(`Invalid DATA_URI_DEFAULT_BASE64 "${rawBase64}". Using default true`);
  }

  return { mode, maxInputSizeMB, defaultBase64 };
}

export const CONFIG = loadConfig();

export function maxInputSizeBytes(config: Config = CONFIG): number {
  return Math.floor(config.maxInputSizeMB * 1024 * 1024);
}
