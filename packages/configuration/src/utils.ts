import { promises as fs } from 'fs';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class ConfigUtils {
  /**
   * Substitute `${VAR}` and `${VAR:-default}` references in every string of a parsed document
   */
  static processEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(entry, env);
      }
      return result;
    }

    return value;
  }

  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, expression: string) => {
      const [name = '', defaultValue] = expression.split(':-');
      const envValue = env[name.trim()];

      if (envValue !== undefined) {
        return envValue;
      }
      return defaultValue ?? match;
    });
  }

  /**
   * Deep-merge plain objects; arrays and primitives from later sources replace earlier ones
   */
  static mergeConfigs(
    target: Record<string, unknown>,
    ...sources: Record<string, unknown>[]
  ): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const source of sources) {
      for (const [key, value] of Object.entries(source)) {
        if (value === undefined) {
          continue;
        }

        const existing = result[key];
        result[key] =
          isPlainObject(value) && isPlainObject(existing)
            ? ConfigUtils.mergeConfigs(existing, value)
            : value;
      }
    }

    return result;
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return isPlainObject(value);
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
