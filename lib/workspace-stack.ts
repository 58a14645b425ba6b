/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * @file WorkspaceStack for deploying the SageMaker workspace.
 *
 * This stack deploys the Workspace construct which includes:
 * - S3 bucket for workspace data, plus its access log bucket
 * - IAM execution role scoped to the workspace bucket
 * - SageMaker domain attached to the looked-up VPC, with a default user profile
 * - SageMaker model package group (if enabled)
 */

import { CfnOutput, Environment, Stack, StackProps } from "aws-cdk-lib";
import { Construct } from "constructs";

import { DeploymentConfig } from "../bin/deployment/load-deployment";
import { WorkspaceNetwork } from "./constructs/workspace/network";
import { Workspace } from "./constructs/workspace/workspace";

export interface WorkspaceStackProps extends StackProps {
  readonly env: Environment;
  readonly deployment: DeploymentConfig;
}

export class WorkspaceStack extends Stack {
  public readonly network: WorkspaceNetwork;
  public readonly workspace: Workspace;

  /**
   * Constructor for the SageMaker workspace cdk stack
   * @param scope the parent construct (an app or a pipeline stage)
   * @param id the id of the stack within the scope.
   * @param props the properties required to create the stack.
   */
  constructor(scope: Construct, id: string, props: WorkspaceStackProps) {
    super(scope, id, {
      terminationProtection: props.deployment.account.prodLike,
      ...props
    });

    this.network = new WorkspaceNetwork(this, "Network", {
      config: props.deployment.networkConfig
    });

    this.workspace = new Workspace(this, "Workspace", {
      account: props.deployment.account,
      network: this.network,
      config: props.deployment.workspaceConfig
    });

    new CfnOutput(this, "BucketName", {
      value: this.workspace.storage.bucket.bucketName
    });
    new CfnOutput(this, "SageMakerDomainId", {
      value: this.workspace.domain.domain.attrDomainId
    });
    new CfnOutput(this, "UserProfileName", {
      value: this.workspace.config.USER_PROFILE_NAME
    });
    if (this.workspace.modelRegistry) {
      new CfnOutput(this, "ModelPackageGroupName", {
        value: this.workspace.config.MODEL_PACKAGE_GROUP_NAME
      });
    }
  }
}
