/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { Annotations } from "aws-cdk-lib";
import { IVpc, Vpc } from "aws-cdk-lib/aws-ec2";
import { Construct } from "constructs";

import { BaseConfig, ConfigType } from "../types";

/**
 * Configuration class for the WorkspaceNetwork Construct.
 */
export class NetworkConfig extends BaseConfig {
  /**
   * The ID of an existing VPC to host the domain.
   * If not provided, the account's default VPC is looked up.
   */
  public readonly VPC_ID?: string;

  /**
   * The subnet IDs the domain should use.
   * If not provided, the public subnets of the VPC are used.
   */
  public readonly TARGET_SUBNETS?: string[];

  /**
   * Creates an instance of NetworkConfig.
   *
   * @param config - The configuration object for the network
   */
  constructor(config: ConfigType = {}) {
    super(config);
  }
}

/**
 * Properties for the WorkspaceNetwork Construct.
 */
export interface WorkspaceNetworkProps {
  /** Optional network configuration. */
  readonly config?: NetworkConfig;
  /** An already imported VPC. When set, no lookup is made and VPC_ID is ignored. */
  readonly vpc?: IVpc;
}

/**
 * Resolves the VPC and subnets a SageMaker domain is attached to.
 *
 * Nothing is created here: the VPC is imported through a context lookup,
 * which requires the enclosing stack to have a concrete account and region.
 */
export class WorkspaceNetwork extends Construct {
  /** The VPC hosting the domain. */
  public readonly vpc: IVpc;
  /** The subnet IDs handed to the domain. */
  public readonly subnetIds: string[];
  /** The network configuration. */
  public readonly config: NetworkConfig;

  /**
   * Creates a new WorkspaceNetwork construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: WorkspaceNetworkProps = {}) {
    super(scope, id);

    this.config = props.config ?? new NetworkConfig();

    if (props.vpc) {
      this.vpc = props.vpc;
    } else if (this.config.VPC_ID) {
      this.vpc = Vpc.fromLookup(this, "ImportedVpc", {
        vpcId: this.config.VPC_ID
      });
    } else {
      this.vpc = Vpc.fromLookup(this, "DefaultVpc", { isDefault: true });
    }

    if (this.config.TARGET_SUBNETS && this.config.TARGET_SUBNETS.length > 0) {
      this.subnetIds = [...this.config.TARGET_SUBNETS];
    } else {
      this.subnetIds = this.vpc.publicSubnets.map((subnet) => subnet.subnetId);
    }

    if (this.subnetIds.length === 0) {
      Annotations.of(this).addError(
        `No subnets available for the SageMaker domain in ${this.vpc.vpcId}: set networkConfig.targetSubnets or use a VPC with public subnets`
      );
    }
  }
}
