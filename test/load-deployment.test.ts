/*
 * Copyright 2025 Amazon.com, Inc. or its affiliates.
 */

/**
 * Unit tests for the deployment configuration loader.
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import {
  DeploymentConfigError,
  loadDeploymentConfig
} from "../bin/deployment/load-deployment";
import { WorkspaceConfig } from "../lib/constructs/workspace/workspace";

const validDeployment = {
  projectName: "test-project",
  account: {
    id: "123456789012",
    region: "us-west-2"
  },
  sourceConfig: {
    repoOwner: "test-owner",
    repoName: "test-repo"
  }
};

describe("loadDeploymentConfig", () => {
  let workDir: string;
  let log: jest.SpyInstance;

  /**
   * Writes the given content to a deployment.json in the work directory.
   */
  const writeDeployment = (content: unknown): string => {
    const path = join(workDir, "deployment.json");
    writeFileSync(
      path,
      typeof content === "string" ? content : JSON.stringify(content)
    );
    return path;
  };

  /**
   * Runs the loader and returns the DeploymentConfigError it throws.
   */
  const loadError = (content: unknown): DeploymentConfigError => {
    const path = writeDeployment(content);
    try {
      loadDeploymentConfig(path);
    } catch (error) {
      if (error instanceof DeploymentConfigError) {
        return error;
      }
      throw error;
    }
    throw new Error("Expected a DeploymentConfigError");
  };

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), "deployment-"));
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(workDir, { recursive: true, force: true });
  });

  test("loads the checked-in deployment for the pinned environment", () => {
    const deployment = loadDeploymentConfig();

    expect(deployment.projectName).toBe("SageMakerS3");
    expect(deployment.account).toEqual({
      id: "257949588515",
      region: "us-east-1",
      prodLike: false
    });
    expect(deployment.sourceConfig.branch).toBe("main");
    expect(deployment.sourceConfig.secretName).toBe("github-token");
  });

  test("applies defaults for optional fields", () => {
    const deployment = loadDeploymentConfig(writeDeployment(validDeployment));

    expect(deployment).toEqual({
      projectName: "test-project",
      account: {
        id: "123456789012",
        region: "us-west-2",
        prodLike: false
      },
      networkConfig: undefined,
      sourceConfig: {
        repoOwner: "test-owner",
        repoName: "test-repo",
        branch: "main",
        secretName: "github-token"
      },
      workspaceConfig: undefined,
      pipelineConfig: undefined
    });
  });

  test("trims string fields", () => {
    const deployment = loadDeploymentConfig(
      writeDeployment({
        ...validDeployment,
        projectName: "  test-project  ",
        sourceConfig: { repoOwner: " test-owner ", repoName: "test-repo" }
      })
    );

    expect(deployment.projectName).toBe("test-project");
    expect(deployment.sourceConfig.repoOwner).toBe("test-owner");
  });

  test("maps the network section", () => {
    const deployment = loadDeploymentConfig(
      writeDeployment({
        ...validDeployment,
        networkConfig: {
          vpcId: "vpc-0a1b2c3d",
          targetSubnets: ["subnet-aaaa", "subnet-bbbb"]
        }
      })
    );

    expect(deployment.networkConfig?.VPC_ID).toBe("vpc-0a1b2c3d");
    expect(deployment.networkConfig?.TARGET_SUBNETS).toEqual([
      "subnet-aaaa",
      "subnet-bbbb"
    ]);
  });

  test("builds workspace and pipeline configuration", () => {
    const deployment = loadDeploymentConfig(
      writeDeployment({
        ...validDeployment,
        account: { ...validDeployment.account, prodLike: true },
        workspaceConfig: { DOMAIN_NAME: "research" },
        pipelineConfig: { PIPELINE_NAME: "ResearchPipeline" }
      })
    );

    expect(deployment.account.prodLike).toBe(true);
    expect(deployment.workspaceConfig).toBeInstanceOf(WorkspaceConfig);
    expect(deployment.workspaceConfig?.DOMAIN_NAME).toBe("research");
    expect(deployment.workspaceConfig?.USER_PROFILE_NAME).toBe("default-user");
    expect(deployment.pipelineConfig).toEqual({
      PIPELINE_NAME: "ResearchPipeline"
    });
  });

  test("announces the loaded deployment once", () => {
    const globalObj = global as { __deploymentConfigLoaded?: boolean };
    globalObj.__deploymentConfigLoaded = undefined;

    const path = writeDeployment(validDeployment);
    loadDeploymentConfig(path);
    loadDeploymentConfig(path);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      "🚀 Using environment from deployment.json: projectName=test-project, region=us-west-2"
    );
  });

  test("rejects a missing file", () => {
    const path = join(workDir, "missing.json");

    expect(() => loadDeploymentConfig(path)).toThrow(
      `Missing deployment.json file at ${path}`
    );
  });

  test("rejects malformed JSON", () => {
    const error = loadError("{ not json");

    expect(error.message).toMatch(/^Invalid JSON format in deployment.json: /);
  });

  test("rejects a non-object document", () => {
    const error = loadError([validDeployment]);

    expect(error.message).toBe(
      "deployment.json must contain a valid JSON object"
    );
  });

  test("rejects a blank project name", () => {
    const error = loadError({ ...validDeployment, projectName: "   " });

    expect(error.message).toBe(
      "Field 'projectName' cannot be empty or contain only whitespace"
    );
    expect(error.field).toBe("projectName");
  });

  test("rejects a missing account section", () => {
    const error = loadError({ ...validDeployment, account: undefined });

    expect(error.message).toBe(
      "Missing or invalid account section in deployment.json"
    );
    expect(error.field).toBe("account");
  });

  test("rejects an invalid account id", () => {
    const error = loadError({
      ...validDeployment,
      account: { id: "1234", region: "us-west-2" }
    });

    expect(error.message).toBe(
      "Invalid AWS account ID format: '1234'. Must be exactly 12 digits."
    );
    expect(error.field).toBe("account.id");
  });

  test("rejects a non-string account id", () => {
    const error = loadError({
      ...validDeployment,
      account: { id: 123456789012, region: "us-west-2" }
    });

    expect(error.message).toBe(
      "Field 'account.id' must be a string, got number"
    );
  });

  test("rejects an invalid region", () => {
    const error = loadError({
      ...validDeployment,
      account: { id: "123456789012", region: "US_WEST" }
    });

    expect(error.message).toBe(
      "Invalid AWS region format: 'US_WEST'. Must follow pattern like 'us-east-1', 'eu-west-2', etc."
    );
    expect(error.field).toBe("account.region");
  });

  test("rejects an invalid VPC id", () => {
    const error = loadError({
      ...validDeployment,
      networkConfig: { vpcId: "vpc-xyz" }
    });

    expect(error.message).toBe(
      "Invalid VPC ID format: 'vpc-xyz'. Must start with 'vpc-' followed by 8 or 17 hexadecimal characters."
    );
    expect(error.field).toBe("networkConfig.vpcId");
  });

  test("rejects target subnets that are not an array", () => {
    const error = loadError({
      ...validDeployment,
      networkConfig: { targetSubnets: "subnet-aaaa" }
    });

    expect(error.message).toBe(
      "Field 'networkConfig.targetSubnets' must be an array"
    );
  });

  test("rejects a non-string subnet id", () => {
    const error = loadError({
      ...validDeployment,
      networkConfig: { targetSubnets: ["subnet-aaaa", 7] }
    });

    expect(error.message).toBe(
      "Field 'networkConfig.targetSubnets[1]' must be a string, got number"
    );
  });

  test("rejects a missing source section", () => {
    const error = loadError({ ...validDeployment, sourceConfig: undefined });

    expect(error.message).toBe(
      "Missing or invalid sourceConfig section in deployment.json"
    );
    expect(error.field).toBe("sourceConfig");
  });

  test("rejects a missing repository name", () => {
    const error = loadError({
      ...validDeployment,
      sourceConfig: { repoOwner: "test-owner" }
    });

    expect(error.message).toBe("Missing required field: sourceConfig.repoName");
    expect(error.field).toBe("sourceConfig.repoName");
  });

  test("surfaces workspace configuration errors", () => {
    const path = writeDeployment({
      ...validDeployment,
      workspaceConfig: { DOMAIN_AUTH_MODE: "OIDC" }
    });

    expect(() => loadDeploymentConfig(path)).toThrow(
      "DOMAIN_AUTH_MODE must be one of IAM"
    );
  });

  test.each(["networkConfig", "workspaceConfig", "pipelineConfig"])(
    "rejects a %s section that is not an object",
    (field) => {
      const error = loadError({ ...validDeployment, [field]: ["unexpected"] });

      expect(error.message).toBe(`Field '${field}' must be a JSON object`);
      expect(error.field).toBe(field);
    }
  );

  test("rejects repository overrides in the pipeline section", () => {
    const error = loadError({
      ...validDeployment,
      pipelineConfig: { BRANCH: "release" }
    });

    expect(error.message).toBe(
      "Field 'pipelineConfig.BRANCH' is not allowed, set it in sourceConfig"
    );
    expect(error.field).toBe("pipelineConfig.BRANCH");
  });

  test("surfaces pipeline configuration errors", () => {
    const path = writeDeployment({
      ...validDeployment,
      pipelineConfig: { SYNTH_COMMANDS: "npm ci" }
    });

    expect(() => loadDeploymentConfig(path)).toThrow(
      "SYNTH_COMMANDS must be a non-empty array of strings"
    );
  });
});
