/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * @file PipelineStack for the self-mutating delivery pipeline.
 *
 * The pipeline runs, in order:
 * - Source: watches the configured GitHub branch
 * - Build: installs dependencies and synthesizes the CDK app
 * - UpdatePipeline: redeploys this stack when its definition changed
 * - Deploy: deploys the WorkspaceStack through the WorkspaceStage
 */

import { Environment, Stack, StackProps } from "aws-cdk-lib";
import { Construct } from "constructs";

import { DeploymentConfig } from "../bin/deployment/load-deployment";
import {
  DeliveryPipeline,
  PipelineConfig
} from "./constructs/pipeline/delivery-pipeline";
import { WorkspaceStage } from "./workspace-stage";

/**
 * Properties for the PipelineStack.
 */
export interface PipelineStackProps extends StackProps {
  /** The environment of the pipeline and of the deployed workspace. */
  readonly env: Environment;
  /** The deployment configuration. */
  readonly deployment: DeploymentConfig;
}

/**
 * Stack hosting the CI/CD pipeline that deploys the SageMaker workspace.
 */
export class PipelineStack extends Stack {
  /** The delivery pipeline. */
  public readonly deliveryPipeline: DeliveryPipeline;
  /** The stage deploying the workspace. */
  public readonly deployStage: WorkspaceStage;

  /**
   * Creates a new PipelineStack.
   *
   * @param scope - The scope in which to define this construct
   * @param id - The construct ID
   * @param props - The stack properties
   */
  constructor(scope: Construct, id: string, props: PipelineStackProps) {
    super(scope, id, props);

    const source = props.deployment.sourceConfig;
    this.deliveryPipeline = new DeliveryPipeline(this, "DeliveryPipeline", {
      config: new PipelineConfig({
        ...props.deployment.pipelineConfig,
        REPO_OWNER: source.repoOwner,
        REPO_NAME: source.repoName,
        BRANCH: source.branch,
        GITHUB_TOKEN_SECRET_NAME: source.secretName
      })
    });

    this.deployStage = new WorkspaceStage(this, "Deploy", {
      env: props.env,
      deployment: props.deployment
    });
    this.deliveryPipeline.addStage(this.deployStage);
  }
}
