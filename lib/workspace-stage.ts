/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Environment, Stage, StageProps } from "aws-cdk-lib";
import { Construct } from "constructs";

import { DeploymentConfig } from "../bin/deployment/load-deployment";
import { WorkspaceStack } from "./workspace-stack";

/**
 * Properties for the WorkspaceStage.
 */
export interface WorkspaceStageProps extends StageProps {
  /** The target environment of the workspace stack. */
  readonly env: Environment;
  /** The deployment configuration. */
  readonly deployment: DeploymentConfig;
}

/**
 * Pipeline stage deploying the SageMaker workspace.
 */
export class WorkspaceStage extends Stage {
  /** The workspace stack deployed by this stage. */
  public readonly workspaceStack: WorkspaceStack;

  /**
   * Creates a new WorkspaceStage.
   *
   * @param scope - The scope in which to define this stage
   * @param id - The stage ID, used as the pipeline stage name
   * @param props - The stage properties
   */
  constructor(scope: Construct, id: string, props: WorkspaceStageProps) {
    super(scope, id, props);

    this.workspaceStack = new WorkspaceStack(this, "SageMakerS3Stack", {
      env: props.env,
      deployment: props.deployment
    });
  }
}
