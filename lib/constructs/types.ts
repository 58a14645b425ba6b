/*
 * Copyright 2023-2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Deployment account configuration interface.
 */
export interface DeploymentAccount {
  /** The AWS account ID. */
  readonly id: string;
  /** The AWS region. */
  readonly region: string;
  /** Whether this is a production-like environment. Defaults to false if not specified. */
  readonly prodLike?: boolean;
}

/**
 * Base configuration type for workspace constructs.
 */
export type ConfigType = Record<string, unknown>;

/**
 * Base configuration class for workspace constructs.
 */
export abstract class BaseConfig {
  /**
   * Constructor for BaseConfig.
   *
   * @param config - The configuration object
   */
  constructor(config: Partial<ConfigType> = {}) {
    Object.assign(this, config);
  }
}
