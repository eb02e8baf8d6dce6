import * as fs from 'fs/promises';
import * as path from 'path';
import * as dotenv from 'dotenv';
import Joi from 'joi';
import _ from 'lodash';
import { Logger } from '@creditops/utils';

export type Environment = 'development' | 'test' | 'production';

export interface PlatformConfig {
  environment: Environment;

  core: {
    name: string;
    version: string;
    logLevel: 'error' | 'warn' | 'info' | 'debug';
  };

  // Hosting service
  server: {
    host: string;
    port: number;
    rateLimitMax: number;
    rateLimitWindow: string;
  };

  // Operator account for the login route
  auth: {
    username: string;
    password: string;
    jwtSecret: string;
    tokenTtlSeconds: number;
  };

  registry: {
    immutableVersions: boolean;
  };

  dataset: {
    path: string;
    idColumn: string;
    targetColumn: string;
    delimiter: string;
  };

  training: {
    nRounds: number;
    learningRate: number;
    maxDepth: number;
    minSamplesLeaf: number;
    lambda: number;
    threshold: number;
    testFraction: number;
    seed: number;
  };

  // Deploy client used by the pipeline
  client: {
    baseUrl: string;
    timeoutMs: number;
  };
}

const configSchema = Joi.object<PlatformConfig>({
  environment: Joi.string().valid('development', 'test', 'production').required(),

  core: Joi.object({
    name: Joi.string().required(),
    version: Joi.string().required(),
    logLevel: Joi.string().valid('error', 'warn', 'info', 'debug').required()
  }).required(),

  server: Joi.object({
    host: Joi.string().required(),
    port: Joi.number().port().required(),
    rateLimitMax: Joi.number().integer().positive().required(),
    rateLimitWindow: Joi.string().required()
  }).required(),

  auth: Joi.object({
    username: Joi.string().min(1).required(),
    password: Joi.string().min(8).required(),
    jwtSecret: Joi.string().min(16).required(),
    tokenTtlSeconds: Joi.number().integer().positive().required()
  }).required(),

  registry: Joi.object({
    immutableVersions: Joi.boolean().required()
  }).required(),

  dataset: Joi.object({
    path: Joi.string().required(),
    idColumn: Joi.string().required(),
    targetColumn: Joi.string().required(),
    delimiter: Joi.string().length(1).required()
  }).required(),

  training: Joi.object({
    nRounds: Joi.number().integer().min(1).required(),
    learningRate: Joi.number().positive().max(1).required(),
    maxDepth: Joi.number().integer().min(1).required(),
    minSamplesLeaf: Joi.number().integer().min(1).required(),
    lambda: Joi.number().min(0).required(),
    threshold: Joi.number().greater(0).less(1).required(),
    testFraction: Joi.number().greater(0).less(1).required(),
    seed: Joi.number().integer().required()
  }).required(),

  client: Joi.object({
    baseUrl: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    timeoutMs: Joi.number().integer().positive().required()
  }).required()
});

// Environment variable → config path
const ENV_MAPPINGS: Record<string, string> = {
  CREDITOPS_LOG_LEVEL: 'core.logLevel',
  CREDITOPS_SERVER_HOST: 'server.host',
  CREDITOPS_SERVER_PORT: 'server.port',
  CREDITOPS_AUTH_USERNAME: 'auth.username',
  CREDITOPS_AUTH_PASSWORD: 'auth.password',
  CREDITOPS_AUTH_JWT_SECRET: 'auth.jwtSecret',
  CREDITOPS_REGISTRY_IMMUTABLE_VERSIONS: 'registry.immutableVersions',
  CREDITOPS_DATASET_PATH: 'dataset.path',
  CREDITOPS_CLIENT_BASE_URL: 'client.baseUrl'
};

const SENSITIVE_KEYS = ['password', 'jwtSecret'];

function isEnvironment(value: string): value is Environment {
  return value === 'development' || value === 'test' || value === 'production';
}

export class ConfigService {
  private logger: Logger;
  private configPath: string;
  private environment: Environment;

  constructor(logger: Logger, configPath: string = './config') {
    this.logger = logger;
    this.configPath = configPath;
    const nodeEnv = process.env.NODE_ENV || 'development';
    this.environment = isEnvironment(nodeEnv) ? nodeEnv : 'development';
  }

  /**
   * Load configuration from files and environment
   */
  async load(environment?: Environment): Promise<PlatformConfig> {
    if (environment) {
      this.environment = environment;
    }

    this.logger.info('Loading configuration', { environment: this.environment });

    try {
      this.loadEnvironmentVariables();

      const baseConfig = await this.loadConfigFile('default.json');
      const envConfig = await this.loadConfigFile(`${this.environment}.json`);

      const merged: Record<string, unknown> = _.merge({}, baseConfig, envConfig, {
        environment: this.environment
      });

      this.applyEnvironmentOverrides(merged);

      const config = this.validateConfig(merged);

      this.logger.info('Configuration loaded successfully', {
        config: this.maskSensitiveValues(config)
      });

      return config;
    } catch (error) {
      this.logger.error('Failed to load configuration', error);
      throw error;
    }
  }

  /**
   * Copy of the configuration with secrets replaced, for logging
   */
  maskSensitiveValues(config: PlatformConfig): Record<string, unknown> {
    return _.cloneDeepWith(config, (value: unknown, key: string | number | undefined) => {
      if (typeof key === 'string' && SENSITIVE_KEYS.includes(key) && typeof value === 'string') {
        return '***MASKED***';
      }
      return undefined;
    });
  }

  private validateConfig(candidate: Record<string, unknown>): PlatformConfig {
    const { error, value } = configSchema.validate(candidate, { convert: true });
    if (error) {
      throw new Error(`Configuration validation failed: ${error.message}`);
    }
    return value;
  }

  private async loadConfigFile(filename: string): Promise<Record<string, unknown>> {
    const filePath = path.join(this.configPath, filename);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.warn(`Configuration file not found: ${filename}`);
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!_.isPlainObject(parsed)) {
      throw new Error(`Configuration file ${filename} must contain a JSON object`);
    }
    return _.toPlainObject(parsed);
  }

  private loadEnvironmentVariables(): void {
    // Load .env file if exists
    dotenv.config({ path: `.env.${this.environment}` });

    // Also load default .env
    dotenv.config();
  }

  private applyEnvironmentOverrides(target: Record<string, unknown>): void {
    for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
      const value = process.env[envVar];
      if (value !== undefined) {
        // Joi converts numeric and boolean strings during validation
        _.set(target, configPath, value);
        this.logger.debug(`Applied environment override: ${configPath}`);
      }
    }
  }
}
