/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { IVpc } from "aws-cdk-lib/aws-ec2";
import { IRole } from "aws-cdk-lib/aws-iam";
import { CfnDomain, CfnUserProfile } from "aws-cdk-lib/aws-sagemaker";
import { Construct } from "constructs";

/**
 * Properties for the WorkspaceDomain Construct.
 */
export interface WorkspaceDomainProps {
  /** The name of the SageMaker domain. */
  readonly domainName: string;
  /** The authentication mode of the domain. Only "IAM" is supported. */
  readonly authMode: string;
  /** The name of the user profile created in the domain. */
  readonly userProfileName: string;
  /** The execution role used by the domain and its user profile. */
  readonly executionRole: IRole;
  /** The VPC hosting the domain. */
  readonly vpc: IVpc;
  /** The subnets the domain network interfaces are placed in. */
  readonly subnetIds: string[];
}

/**
 * A SageMaker domain with a single user profile.
 */
export class WorkspaceDomain extends Construct {
  /** The SageMaker domain. */
  public readonly domain: CfnDomain;
  /** The user profile created in {@link domain}. */
  public readonly userProfile: CfnUserProfile;

  /**
   * Creates a new WorkspaceDomain construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: WorkspaceDomainProps) {
    super(scope, id);

    this.domain = new CfnDomain(this, "SageMakerDomain", {
      authMode: props.authMode,
      domainName: props.domainName,
      defaultUserSettings: {
        executionRole: props.executionRole.roleArn
      },
      subnetIds: props.subnetIds,
      vpcId: props.vpc.vpcId
    });

    this.userProfile = new CfnUserProfile(this, "DefaultUserProfile", {
      domainId: this.domain.attrDomainId,
      userProfileName: props.userProfileName,
      userSettings: {
        executionRole: props.executionRole.roleArn
      }
    });
  }
}
