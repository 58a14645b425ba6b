/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { IRole, ManagedPolicy, Role, ServicePrincipal } from "aws-cdk-lib/aws-iam";
import { IBucket } from "aws-cdk-lib/aws-s3";
import { NagSuppressions } from "cdk-nag";
import { Construct } from "constructs";

/**
 * Properties for the WorkspaceExecutionRole Construct.
 */
export interface WorkspaceExecutionRoleProps {
  /** The only bucket the role is granted read/write access to. */
  readonly bucket: IBucket;
  /** Name of the AWS managed policy attached to the role. */
  readonly managedPolicyName: string;
}

/**
 * The execution role assumed by SageMaker on behalf of the domain and its
 * user profiles.
 */
export class WorkspaceExecutionRole extends Construct {
  /** The SageMaker execution role. */
  public readonly role: IRole;

  /**
   * Creates a new WorkspaceExecutionRole construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(
    scope: Construct,
    id: string,
    props: WorkspaceExecutionRoleProps
  ) {
    super(scope, id);

    const role = new Role(this, "SageMakerRole", {
      assumedBy: new ServicePrincipal("sagemaker.amazonaws.com"),
      description:
        "Allows SageMaker domain users to read and write the workspace bucket",
      managedPolicies: [
        ManagedPolicy.fromAwsManagedPolicyName(props.managedPolicyName)
      ]
    });

    props.bucket.grantReadWrite(role);

    NagSuppressions.addResourceSuppressions(
      role,
      [
        {
          id: "AwsSolutions-IAM4",
          reason: `SageMaker Studio requires the AWS managed ${props.managedPolicyName} policy`
        },
        {
          id: "AwsSolutions-IAM5",
          reason:
            "Object-level wildcards are limited to the workspace bucket created alongside this role"
        }
      ],
      true
    );

    this.role = role;
  }
}
