#!/usr/bin/env node

/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * @file Entry point for the SageMaker workspace CDK application.
 *
 * This file bootstraps the CDK app, loads deployment configuration,
 * instantiates the PipelineStack (which embeds the WorkspaceStack in its
 * Deploy stage) and synthesizes the templates.
 */

import "source-map-support/register";

import { App } from "aws-cdk-lib";

import { PipelineStack } from "../lib/pipeline-stack";
import { loadDeploymentConfig } from "./deployment/load-deployment";

// -----------------------------------------------------------------------------
// Initialize CDK Application
// -----------------------------------------------------------------------------

const app = new App();

// -----------------------------------------------------------------------------
// Load the deployment configuration.
// -----------------------------------------------------------------------------

const deployment = loadDeploymentConfig();

// -----------------------------------------------------------------------------
// Deploy the PipelineStack. The workspace itself is deployed by the pipeline.
// -----------------------------------------------------------------------------

new PipelineStack(app, `${deployment.projectName}-Pipeline`, {
  env: {
    account: deployment.account.id,
    region: deployment.account.region
  },
  deployment: deployment
});

app.synth();
