import { ConfigError, type FileSystem } from "#/core";
import { safeParseYaml } from "#/friendly-errors";
import { LocalConfigSchema, type LocalConfig } from "#/schemas";

/**
 * Read the local config file.
 * Returns null when the file does not exist.
 */
export function loadLocalConfig(fs: FileSystem, configPath: string): LocalConfig | null {
  if (!fs.exists(configPath)) {
    return null;
  }

  const result = safeParseYaml(fs.readFile(configPath), LocalConfigSchema, configPath);
  if (!result.success) {
    throw new ConfigError(result.error.message, result.error.details);
  }
  return result.data;
}
