import { promises as fs } from 'fs';

import type { Logger } from '@wlanctl/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils, fileExists } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  logger?: Logger;
  /** Substitute `${VAR}` references from the environment before validation */
  enableEnvSubstitution?: boolean;
  /** Values merged underneath the loaded document */
  defaults?: Record<string, unknown>;
}

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  }
}

/**
 * YAML configuration manager with zod validation
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;
  private readonly enableEnvSubstitution: boolean;
  private readonly defaults: Record<string, unknown> | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
    this.enableEnvSubstitution = options.enableEnvSubstitution ?? true;
    this.defaults = options.defaults;
  }

  /**
   * Load, substitute, merge and validate the configuration file
   */
  async loadConfig(): Promise<T> {
    try {
      if (!(await fileExists(this.configPath))) {
        throw new Error(`Configuration file not found: ${this.configPath}`);
      }

      const content = await fs.readFile(this.configPath, 'utf8');
      const config = this.validateAndTransform(yamlLoad(content) ?? {});

      this.config = config;
      this.logger?.info(`Configuration loaded from: ${this.configPath}`);
      return config;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${error.message}`, undefined, {
          issues: error.getFormattedErrors(),
        });
      } else {
        this.logger?.error('Failed to load configuration', error, { path: this.configPath });
      }
      throw error;
    }
  }

  /**
   * Validate an already-parsed document
   */
  validateAndTransform(document: unknown): T {
    let processed = document;

    if (this.enableEnvSubstitution) {
      processed = ConfigUtils.processEnvVars(processed);
    }

    if (this.defaults && ConfigUtils.isPlainObject(processed)) {
      processed = ConfigUtils.mergeConfigs(this.defaults, processed);
    }

    const result = this.schema.safeParse(processed);
    if (!result.success) {
      throw new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
    }

    return result.data;
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

export { z } from 'zod';
export { ConfigUtils, fileExists } from './utils.js';
export * from './schemas.js';
