/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { CfnModelPackageGroup } from "aws-cdk-lib/aws-sagemaker";
import { Construct } from "constructs";

/**
 * Properties for the ModelRegistry Construct.
 */
export interface ModelRegistryProps {
  /** The name of the model package group. */
  readonly modelPackageGroupName: string;
  /** A description of the model package group. */
  readonly description: string;
}

/**
 * A SageMaker model package group that versions the models trained in the
 * workspace.
 */
export class ModelRegistry extends Construct {
  /** The model package group. */
  public readonly modelPackageGroup: CfnModelPackageGroup;

  constructor(scope: Construct, id: string, props: ModelRegistryProps) {
    super(scope, id);

    this.modelPackageGroup = new CfnModelPackageGroup(
      this,
      "ModelPackageGroup",
      {
        modelPackageGroupName: props.modelPackageGroupName,
        modelPackageGroupDescription: props.description
      }
    );
  }
}
