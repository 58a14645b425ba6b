/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

import { RemovalPolicy, Stack } from "aws-cdk-lib";
import {
  BlockPublicAccess,
  Bucket,
  BucketEncryption,
  ObjectOwnership
} from "aws-cdk-lib/aws-s3";
import { NagSuppressions } from "cdk-nag";
import { Construct } from "constructs";

import { DeploymentAccount } from "../types";

/**
 * Properties for the WorkspaceStorage Construct.
 */
export interface WorkspaceStorageProps {
  /** The deployment account. */
  readonly account: DeploymentAccount;
  /** The removal policy for the buckets. */
  readonly removalPolicy: RemovalPolicy;
  /** Whether objects are deleted when the buckets are removed. */
  readonly autoDeleteObjects: boolean;
  /**
   * Prefix for the physical bucket names. When omitted CloudFormation
   * generates the names.
   */
  readonly bucketPrefix?: string;
}

/**
 * The S3 storage backing the SageMaker workspace: a versioned, encrypted
 * bucket for workspace data and a bucket receiving its server access logs.
 */
export class WorkspaceStorage extends Construct {
  /** The bucket holding workspace data. */
  public readonly bucket: Bucket;
  /** The bucket receiving server access logs for {@link bucket}. */
  public readonly accessLogBucket: Bucket;

  /**
   * Creates a new WorkspaceStorage construct.
   *
   * @param scope - The scope/stack in which to define this construct
   * @param id - The id of this construct within the current scope
   * @param props - The properties for configuring this construct
   */
  constructor(scope: Construct, id: string, props: WorkspaceStorageProps) {
    super(scope, id);

    this.accessLogBucket = new Bucket(this, "AccessLogBucket", {
      bucketName: props.bucketPrefix
        ? `${props.bucketPrefix}-access-logs-${props.account.id}`
        : undefined,
      autoDeleteObjects: props.autoDeleteObjects,
      enforceSSL: true,
      encryption: BucketEncryption.S3_MANAGED,
      blockPublicAccess: BlockPublicAccess.BLOCK_ALL,
      objectOwnership: ObjectOwnership.BUCKET_OWNER_PREFERRED,
      removalPolicy: props.removalPolicy
    });

    this.bucket = new Bucket(this, "SageMakerBucket", {
      bucketName: props.bucketPrefix
        ? `${props.bucketPrefix}-${props.account.id}`
        : undefined,
      versioned: true,
      autoDeleteObjects: props.autoDeleteObjects,
      enforceSSL: true,
      encryption: BucketEncryption.S3_MANAGED,
      blockPublicAccess: BlockPublicAccess.BLOCK_ALL,
      removalPolicy: props.removalPolicy,
      serverAccessLogsBucket: this.accessLogBucket,
      serverAccessLogsPrefix: "access-logs/"
    });

    NagSuppressions.addResourceSuppressions(this.accessLogBucket, [
      {
        id: "AwsSolutions-S1",
        reason:
          "This bucket is the server access log destination for the workspace bucket"
      }
    ]);

    // Auto deletion is backed by a CDK-managed Lambda provider
    if (props.autoDeleteObjects) {
      NagSuppressions.addStackSuppressions(Stack.of(this), [
        {
          id: "AwsSolutions-IAM4",
          reason:
            "The CDK auto-delete-objects provider role uses the AWS managed Lambda basic execution policy"
        },
        {
          id: "AwsSolutions-L1",
          reason:
            "The CDK auto-delete-objects provider runtime is managed by the CDK framework"
        }
      ]);
    }
  }
}
