/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Stage } from "aws-cdk-lib";
import { Secret } from "aws-cdk-lib/aws-secretsmanager";
import {
  CodePipeline,
  CodePipelineSource,
  ShellStep,
  StageDeployment
} from "aws-cdk-lib/pipelines";
import { Construct } from "constructs";

import { BaseConfig, ConfigType } from "../types";

const PIPELINE_STRING_FIELDS = [
  "PIPELINE_NAME",
  "REPO_OWNER",
  "REPO_NAME",
  "BRANCH",
  "GITHUB_TOKEN_SECRET_NAME"
];

/**
 * Fields owned by the deployment's source repository section. They cannot be
 * overridden through pipeline configuration.
 */
export const SOURCE_FIELDS = [
  "REPO_OWNER",
  "REPO_NAME",
  "BRANCH",
  "GITHUB_TOKEN_SECRET_NAME"
];

/**
 * Configuration class for the DeliveryPipeline Construct.
 */
export class PipelineConfig extends BaseConfig {
  /**
   * The name of the CodePipeline pipeline.
   * @default "SageMakerS3Pipeline"
   */
  public readonly PIPELINE_NAME!: string;

  /** The GitHub owner (user or organization) of the source repository. */
  public readonly REPO_OWNER!: string;

  /** The GitHub repository name. */
  public readonly REPO_NAME!: string;

  /**
   * The branch that triggers the pipeline.
   * @default "main"
   */
  public readonly BRANCH!: string;

  /**
   * The Secrets Manager secret holding the GitHub access token.
   * @default "github-token"
   */
  public readonly GITHUB_TOKEN_SECRET_NAME!: string;

  /** The commands run by the synth step. */
  public readonly SYNTH_COMMANDS!: string[];

  /**
   * Creates an instance of PipelineConfig.
   *
   * @param config - The configuration object for the pipeline
   * @throws Error if validation fails
   */
  constructor(config: ConfigType = {}) {
    const mergedConfig = {
      PIPELINE_NAME: "SageMakerS3Pipeline",
      BRANCH: "main",
      GITHUB_TOKEN_SECRET_NAME: "github-token",
      SYNTH_COMMANDS: ["npm install", "npm run build", "npx cdk synth"],
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

    for (const key of PIPELINE_STRING_FIELDS) {
      const value = config[key];
      if (typeof value !== "string" || value.trim() === "") {
        errors.push(`${key} must be a non-empty string`);
      }
    }

    const commands = config.SYNTH_COMMANDS;
    if (
      !Array.isArray(commands) ||
      commands.length === 0 ||
      !commands.every((command) => typeof command === "string")
    ) {
      errors.push("SYNTH_COMMANDS must be a non-empty array of strings");
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed:\n${errors.join("\n")}`);
    }
  }
}

/**
 * Properties for the DeliveryPipeline Construct.
 */
export interface DeliveryPipelineProps {
  /** The pipeline configuration. */
  readonly config: PipelineConfig;
}

/**
 * A self-mutating CDK pipeline sourced from a GitHub branch.
 *
 * The pipeline runs Source, Build (synth) and UpdatePipeline before any
 * stage added through {@link addStage}.
 */
export class DeliveryPipeline extends Construct {
  /** The CDK pipeline. */
  public readonly pipeline: CodePipeline;
  /** The GitHub source the pipeline watches. */
  public readonly source: CodePipelineSource;
  /** The configuration for the pipeline. */
  public readonly config: PipelineConfig;

  /**
   * Creates a new DeliveryPipeline construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: DeliveryPipelineProps) {
    super(scope, id);

    this.config = props.config;

    // The token is only referenced by name, it is resolved by CloudFormation
    const githubToken = Secret.fromSecretNameV2(
      this,
      "GitHubToken",
      this.config.GITHUB_TOKEN_SECRET_NAME
    );

    this.source = CodePipelineSource.gitHub(
      `${this.config.REPO_OWNER}/${this.config.REPO_NAME}`,
      this.config.BRANCH,
      {
        authentication: githubToken.secretValue
      }
    );

    this.pipeline = new CodePipeline(this, "Pipeline", {
      pipelineName: this.config.PIPELINE_NAME,
      synth: new ShellStep("Synth", {
        input: this.source,
        commands: this.config.SYNTH_COMMANDS,
        primaryOutputDirectory: "cdk.out"
      }),
      selfMutation: true
    });
  }

  /**
   * Deploys a stage after the pipeline has updated itself.
   *
   * @param stage - The stage to deploy
   * @returns The stage deployment
   */
  public addStage(stage: Stage): StageDeployment {
    return this.pipeline.addStage(stage);
  }
}
