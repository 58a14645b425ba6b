/**
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Utility to load and validate the deployment configuration file.
 *
 * This module provides a strongly typed interface for reading the `deployment.json`
 * configuration, performing required validations, and returning a structured result.
 *
 * Expected structure of `deployment.json`:
 * ```json
 * {
 *   "projectName": "SageMakerS3",
 *   "account": {
 *     "id": "123456789012",
 *     "region": "us-east-1",
 *     "prodLike": false  // Optional: defaults to false if not specified
 *   },
 *   "networkConfig": {
 *     "vpcId": "vpc-abc12345",  // Optional: if not provided, the default VPC is looked up
 *     "targetSubnets": ["subnet-12345", "subnet-67890"]  // Optional: defaults to the VPC's public subnets
 *   },
 *   "sourceConfig": {
 *     "repoOwner": "example-org",
 *     "repoName": "sagemaker-workspace-infra",
 *     "branch": "main",  // Optional: defaults to "main"
 *     "secretName": "github-token"  // Optional: Secrets Manager secret holding the GitHub token
 *   },
 *   "workspaceConfig": {
 *     "DOMAIN_NAME": "my-sagemaker-domain"  // Optional: overrides of the WorkspaceConfig defaults
 *   },
 *   "pipelineConfig": {
 *     "PIPELINE_NAME": "SageMakerS3Pipeline"  // Optional: overrides of the PipelineConfig defaults
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";

import {
  PipelineConfig,
  SOURCE_FIELDS
} from "../../lib/constructs/pipeline/delivery-pipeline";
import { NetworkConfig } from "../../lib/constructs/workspace/network";
import { WorkspaceConfig } from "../../lib/constructs/workspace/workspace";

/**
 * The GitHub repository the pipeline is sourced from.
 */
export interface SourceConfig {
  /** The GitHub owner (user or organization) of the repository. */
  repoOwner: string;
  /** The repository name. */
  repoName: string;
  /** The branch that triggers the pipeline. */
  branch: string;
  /** The Secrets Manager secret name holding the GitHub access token. */
  secretName: string;
}

/**
 * Represents the structure of the deployment configuration file.
 */
export interface DeploymentConfig {
  /** Logical name of the project, used for the CDK stack ID. */
  projectName: string;

  /** AWS account configuration. */
  account: {
    /** AWS Account ID. */
    id: string;
    /** AWS region for deployment. */
    region: string;
    /** Whether the account is prod-like. Defaults to false if not specified. */
    prodLike?: boolean;
  };

  /** Networking configuration. If VPC_ID is provided, that VPC is imported. Otherwise, the default VPC is used. */
  networkConfig?: NetworkConfig;

  /** Source repository of the pipeline. */
  sourceConfig: SourceConfig;

  /** Optional Workspace configuration. */
  workspaceConfig?: WorkspaceConfig;

  /** Optional pipeline configuration overrides passed to the PipelineConfig constructor. */
  pipelineConfig?: Partial<Record<string, unknown>>;
}

/**
 * Validation error class for deployment configuration issues.
 */
export class DeploymentConfigError extends Error {
  /**
   * Creates a new DeploymentConfigError.
   *
   * @param message - The error message
   * @param field - Optional field name that caused the error
   */
  constructor(
    message: string,
    public field?: string
  ) {
    super(message);
    this.name = "DeploymentConfigError";
  }
}

/**
 * Narrows an unknown value to a plain object.
 */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates and trims a string field, checking for required value and whitespace.
 *
 * @param value - The value to validate
 * @param fieldName - The name of the field being validated (for error messages)
 * @param isRequired - Whether the field is required (default: true)
 * @returns The trimmed string value
 * @throws {DeploymentConfigError} If validation fails
 */
function validateStringField(
  value: unknown,
  fieldName: string,
  isRequired: boolean = true
): string {
  if (value === undefined || value === null) {
    if (isRequired) {
      throw new DeploymentConfigError(
        `Missing required field: ${fieldName}`,
        fieldName
      );
    }
    return "";
  }

  if (typeof value !== "string") {
    throw new DeploymentConfigError(
      `Field '${fieldName}' must be a string, got ${typeof value}`,
      fieldName
    );
  }

  const trimmed = value.trim();
  if (isRequired && trimmed === "") {
    throw new DeploymentConfigError(
      `Field '${fieldName}' cannot be empty or contain only whitespace`,
      fieldName
    );
  }

  return trimmed;
}

/**
 * Validates AWS account ID format.
 *
 * @param accountId - The account ID to validate
 * @returns The validated account ID
 * @throws {DeploymentConfigError} If the account ID format is invalid
 */
function validateAccountId(accountId: string): string {
  if (!/^\d{12}$/.test(accountId)) {
    throw new DeploymentConfigError(
      `Invalid AWS account ID format: '${accountId}'. Must be exactly 12 digits.`,
      "account.id"
    );
  }
  return accountId;
}

/**
 * Validates AWS region format using pattern matching.
 *
 * @param region - The region to validate
 * @returns The validated region
 * @throws {DeploymentConfigError} If the region format is invalid
 */
function validateRegion(region: string): string {
  // AWS region pattern: letters/numbers, hyphen, letters/numbers, optional hyphen and numbers
  if (!/^[a-z0-9]+-[a-z0-9]+(?:-[a-z0-9]+)*$/.test(region)) {
    throw new DeploymentConfigError(
      `Invalid AWS region format: '${region}'. Must follow pattern like 'us-east-1', 'eu-west-2', etc.`,
      "account.region"
    );
  }
  return region;
}

/**
 * Validates VPC ID format.
 *
 * @param vpcId - The VPC ID to validate
 * @returns The validated VPC ID
 * @throws {DeploymentConfigError} If the VPC ID format is invalid
 */
function validateVpcId(vpcId: string): string {
  if (!/^vpc-[a-f0-9]{8}(?:[a-f0-9]{9})?$/.test(vpcId)) {
    throw new DeploymentConfigError(
      `Invalid VPC ID format: '${vpcId}'. Must start with 'vpc-' followed by 8 or 17 hexadecimal characters.`,
      "networkConfig.vpcId"
    );
  }
  return vpcId;
}

/**
 * Returns an optional section, rejecting values that are present but not objects.
 *
 * @param value - The raw section value
 * @param fieldName - The name of the section for error messages
 * @returns The section, or undefined when it is absent
 * @throws {DeploymentConfigError} If the section is not a JSON object
 */
function optionalSection(
  value: unknown,
  fieldName: string
): Record<string, unknown> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new DeploymentConfigError(
      `Field '${fieldName}' must be a JSON object`,
      fieldName
    );
  }
  return value;
}

/**
 * Parses the optional networking section.
 *
 * @param value - The raw `networkConfig` value
 * @returns The network configuration, or undefined when the section is absent
 * @throws {DeploymentConfigError} If a field is invalid
 */
function parseNetworkConfig(input: unknown): NetworkConfig | undefined {
  const value = optionalSection(input, "networkConfig");
  if (!value) {
    return undefined;
  }

  const networkConfigData: Record<string, unknown> = {};

  // Map vpcId to VPC_ID
  if (value.vpcId !== undefined && value.vpcId !== null) {
    networkConfigData.VPC_ID = validateVpcId(
      validateStringField(value.vpcId, "networkConfig.vpcId")
    );
  }

  // Map targetSubnets to TARGET_SUBNETS
  if (value.targetSubnets !== undefined && value.targetSubnets !== null) {
    if (!Array.isArray(value.targetSubnets)) {
      throw new DeploymentConfigError(
        "Field 'networkConfig.targetSubnets' must be an array",
        "networkConfig.targetSubnets"
      );
    }
    networkConfigData.TARGET_SUBNETS = value.targetSubnets.map(
      (subnetId: unknown, index: number) =>
        validateStringField(subnetId, `networkConfig.targetSubnets[${index}]`)
    );
  }

  return new NetworkConfig(networkConfigData);
}

/**
 * Parses the required source repository section.
 *
 * @param value - The raw `sourceConfig` value
 * @returns The validated source configuration
 * @throws {DeploymentConfigError} If the section is missing or invalid
 */
function parseSourceConfig(value: unknown): SourceConfig {
  if (!isRecord(value)) {
    throw new DeploymentConfigError(
      "Missing or invalid sourceConfig section in deployment.json",
      "sourceConfig"
    );
  }

  const branch = validateStringField(
    value.branch,
    "sourceConfig.branch",
    false
  );
  const secretName = validateStringField(
    value.secretName,
    "sourceConfig.secretName",
    false
  );

  return {
    repoOwner: validateStringField(value.repoOwner, "sourceConfig.repoOwner"),
    repoName: validateStringField(value.repoName, "sourceConfig.repoName"),
    branch: branch || "main",
    secretName: secretName || "github-token"
  };
}

/**
 * Loads and validates the deployment configuration, by default from `deployment/deployment.json`.
 *
 * @param deploymentPath - Optional path of the configuration file
 * @returns A validated {@link DeploymentConfig} object
 * @throws {DeploymentConfigError} If the file is missing, malformed, or contains invalid values
 */
export function loadDeploymentConfig(
  deploymentPath: string = join(__dirname, "deployment.json")
): DeploymentConfig {
  if (!existsSync(deploymentPath)) {
    throw new DeploymentConfigError(
      `Missing deployment.json file at ${deploymentPath}`
    );
  }

  let parsed: unknown;
  try {
    const rawContent = readFileSync(deploymentPath, "utf-8");
    parsed = JSON.parse(rawContent);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new DeploymentConfigError(
        `Invalid JSON format in deployment.json: ${error.message}`
      );
    }
    throw new DeploymentConfigError(
      `Failed to read deployment.json: ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }

  // Validate top-level structure
  if (!isRecord(parsed)) {
    throw new DeploymentConfigError(
      "deployment.json must contain a valid JSON object"
    );
  }

  const projectName = validateStringField(parsed.projectName, "projectName");

  // Validate account section
  if (!isRecord(parsed.account)) {
    throw new DeploymentConfigError(
      "Missing or invalid account section in deployment.json",
      "account"
    );
  }

  const accountId = validateAccountId(
    validateStringField(parsed.account.id, "account.id")
  );
  const region = validateRegion(
    validateStringField(parsed.account.region, "account.region")
  );
  const prodLike =
    typeof parsed.account.prodLike === "boolean"
      ? parsed.account.prodLike
      : false;

  const networkConfig = parseNetworkConfig(parsed.networkConfig);
  const sourceConfig = parseSourceConfig(parsed.sourceConfig);

  // Parse optional workspaceConfig
  const workspaceSection = optionalSection(
    parsed.workspaceConfig,
    "workspaceConfig"
  );
  const workspaceConfig = workspaceSection
    ? new WorkspaceConfig(workspaceSection)
    : undefined;

  // Parse optional pipelineConfig, the repository itself comes from sourceConfig
  const pipelineConfig = optionalSection(
    parsed.pipelineConfig,
    "pipelineConfig"
  );
  if (pipelineConfig) {
    for (const key of SOURCE_FIELDS) {
      if (key in pipelineConfig) {
        throw new DeploymentConfigError(
          `Field 'pipelineConfig.${key}' is not allowed, set it in sourceConfig`,
          `pipelineConfig.${key}`
        );
      }
    }
    // Surface invalid overrides at load time
    new PipelineConfig({
      ...pipelineConfig,
      REPO_OWNER: sourceConfig.repoOwner,
      REPO_NAME: sourceConfig.repoName,
      BRANCH: sourceConfig.branch,
      GITHUB_TOKEN_SECRET_NAME: sourceConfig.secretName
    });
  }

  const validatedConfig: DeploymentConfig = {
    projectName,
    account: {
      id: accountId,
      region: region,
      prodLike: prodLike
    },
    networkConfig,
    sourceConfig,
    workspaceConfig,
    pipelineConfig
  };

  // Only log non-sensitive configuration details (prevent duplicate logging)
  const globalObj = global as { __deploymentConfigLoaded?: boolean };
  if (!globalObj.__deploymentConfigLoaded) {
    console.log(
      `🚀 Using environment from deployment.json: projectName=${validatedConfig.projectName}, region=${validatedConfig.account.region}`
    );
    globalObj.__deploymentConfigLoaded = true;
  }

  return validatedConfig;
}
