/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { RemovalPolicy } from "aws-cdk-lib";
import { Construct } from "constructs";

import { BaseConfig, ConfigType, DeploymentAccount } from "../types";
import { WorkspaceDomain } from "./domain";
import { WorkspaceExecutionRole } from "./execution-role";
import { ModelRegistry } from "./model-registry";
import { WorkspaceNetwork } from "./network";
import { WorkspaceStorage } from "./storage";

// SageMaker resource name constraint shared by domains, user profiles and model package groups
const SAGEMAKER_NAME_PATTERN = /^[a-zA-Z0-9](-*[a-zA-Z0-9]){0,62}$/;

const AUTH_MODES = ["IAM"];

// Lowercase S3 bucket name characters; the prefix must leave room for "-access-logs-" and the account id
const BUCKET_PREFIX_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
const BUCKET_PREFIX_MAX_LENGTH = 38;

/**
 * Configuration class for the Workspace Construct.
 *
 * This class provides a strongly-typed configuration interface for the
 * SageMaker workspace, with validation and default values.
 */
export class WorkspaceConfig extends BaseConfig {
  /** Prefix for the physical bucket names. Generated names are used when unset. */
  public readonly S3_BUCKET_PREFIX?: string;
  /** Whether bucket objects are deleted along with the buckets. Ignored for prod-like accounts. */
  public readonly S3_AUTO_DELETE_OBJECTS!: boolean;
  /** The name of the SageMaker domain. */
  public readonly DOMAIN_NAME!: string;
  /** The authentication mode of the domain. */
  public readonly DOMAIN_AUTH_MODE!: string;
  /** The name of the user profile created in the domain. */
  public readonly USER_PROFILE_NAME!: string;
  /** The AWS managed policy attached to the execution role. */
  public readonly EXECUTION_ROLE_MANAGED_POLICY!: string;
  /** Whether to deploy a model package group. */
  public readonly ENABLE_MODEL_REGISTRY!: boolean;
  /** The name of the model package group. */
  public readonly MODEL_PACKAGE_GROUP_NAME!: string;
  /** The description of the model package group. */
  public readonly MODEL_PACKAGE_GROUP_DESCRIPTION!: string;

  /**
   * Constructor for WorkspaceConfig.
   *
   * @param config - The configuration object for the Workspace
   */
  constructor(config: Partial<ConfigType> = {}) {
    const mergedConfig = {
      S3_AUTO_DELETE_OBJECTS: false,
      DOMAIN_NAME: "my-sagemaker-domain",
      DOMAIN_AUTH_MODE: "IAM",
      USER_PROFILE_NAME: "default-user",
      EXECUTION_ROLE_MANAGED_POLICY: "AmazonSageMakerFullAccess",
      ENABLE_MODEL_REGISTRY: true,
      MODEL_PACKAGE_GROUP_NAME: "AbalonePackageGroup",
      MODEL_PACKAGE_GROUP_DESCRIPTION: "Model Package Group for Abalone Pipeline",
      ...config
    };
    super(mergedConfig);

    this.validateConfig(mergedConfig);
  }

  /**
   * Validates the configuration values.
   *
   * @param config - The configuration to validate
   * @throws Error if validation fails
   */
  private validateConfig(config: Record<string, unknown>): void {
    const errors: string[] = [];

    const names: [string, unknown][] = [
      ["DOMAIN_NAME", config.DOMAIN_NAME],
      ["USER_PROFILE_NAME", config.USER_PROFILE_NAME],
      ["MODEL_PACKAGE_GROUP_NAME", config.MODEL_PACKAGE_GROUP_NAME]
    ];
    for (const [key, value] of names) {
      if (typeof value !== "string" || !SAGEMAKER_NAME_PATTERN.test(value)) {
        errors.push(
          `${key} must be 1-63 alphanumeric characters or hyphens and start with an alphanumeric character`
        );
      }
    }

    if (
      typeof config.DOMAIN_AUTH_MODE !== "string" ||
      !AUTH_MODES.includes(config.DOMAIN_AUTH_MODE)
    ) {
      errors.push(`DOMAIN_AUTH_MODE must be one of ${AUTH_MODES.join(", ")}`);
    }

    const prefix = config.S3_BUCKET_PREFIX;
    if (
      prefix !== undefined &&
      (typeof prefix !== "string" ||
        prefix.length > BUCKET_PREFIX_MAX_LENGTH ||
        !BUCKET_PREFIX_PATTERN.test(prefix))
    ) {
      errors.push(
        `S3_BUCKET_PREFIX must be 1-${BUCKET_PREFIX_MAX_LENGTH} lowercase letters, digits or hyphens and start and end with a letter or digit`
      );
    }

    if (typeof config.S3_AUTO_DELETE_OBJECTS !== "boolean") {
      errors.push("S3_AUTO_DELETE_OBJECTS must be a boolean");
    }
    if (typeof config.ENABLE_MODEL_REGISTRY !== "boolean") {
      errors.push("ENABLE_MODEL_REGISTRY must be a boolean");
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed:\n${errors.join("\n")}`);
    }
  }
}

/**
 * Interface representing properties for configuring the Workspace Construct.
 */
export interface WorkspaceProps {
  /** The deployment account. */
  readonly account: DeploymentAccount;
  /** The resolved network for the domain. */
  readonly network: WorkspaceNetwork;
  /** Custom configuration for the Workspace Construct (optional). */
  readonly config?: WorkspaceConfig;
}

/**
 * Represents the SageMaker workspace: the storage bucket, the execution role
 * scoped to it, the domain with its user profile and the model registry.
 */
export class Workspace extends Construct {
  /** The configuration for the Workspace. */
  public readonly config: WorkspaceConfig;
  /** The removal policy for resources created by this construct. */
  public readonly removalPolicy: RemovalPolicy;

  /** The workspace storage. */
  public readonly storage: WorkspaceStorage;
  /** The SageMaker execution role. */
  public readonly executionRole: WorkspaceExecutionRole;
  /** The SageMaker domain and user profile. */
  public readonly domain: WorkspaceDomain;
  /** The model registry. */
  public readonly modelRegistry?: ModelRegistry;

  /**
   * Constructs an instance of Workspace.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties of this construct
   */
  constructor(scope: Construct, id: string, props: WorkspaceProps) {
    super(scope, id);

    this.config = props.config ?? new WorkspaceConfig();
    this.removalPolicy = props.account.prodLike
      ? RemovalPolicy.RETAIN
      : RemovalPolicy.DESTROY;

    this.storage = new WorkspaceStorage(this, "Storage", {
      account: props.account,
      removalPolicy: this.removalPolicy,
      // Retained buckets keep their objects
      autoDeleteObjects:
        this.config.S3_AUTO_DELETE_OBJECTS &&
        this.removalPolicy === RemovalPolicy.DESTROY,
      bucketPrefix: this.config.S3_BUCKET_PREFIX
    });

    this.executionRole = new WorkspaceExecutionRole(this, "ExecutionRole", {
      bucket: this.storage.bucket,
      managedPolicyName: this.config.EXECUTION_ROLE_MANAGED_POLICY
    });

    this.domain = new WorkspaceDomain(this, "Domain", {
      domainName: this.config.DOMAIN_NAME,
      authMode: this.config.DOMAIN_AUTH_MODE,
      userProfileName: this.config.USER_PROFILE_NAME,
      executionRole: this.executionRole.role,
      vpc: props.network.vpc,
      subnetIds: props.network.subnetIds
    });

    if (this.config.ENABLE_MODEL_REGISTRY) {
      this.modelRegistry = new ModelRegistry(this, "ModelRegistry", {
        modelPackageGroupName: this.config.MODEL_PACKAGE_GROUP_NAME,
        description: this.config.MODEL_PACKAGE_GROUP_DESCRIPTION
      });
    }
  }
}
