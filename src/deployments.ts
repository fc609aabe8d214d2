import * as core from '@actions/core';
import { ResponseParseError } from './errors';
import { postJson, type PostOptions } from './http';
import { parseRepositoryUrl } from './repository';
import { resolveDescription, resolveState } from './status';
import {
  deploymentResponseSchema,
  type DeploymentReport,
  type DeploymentRequest,
  type DeploymentResponse,
  type DeploymentStatusRequest,
  type ReporterConfig,
  type RepositoryRef,
} from './types';

export const DEPLOYMENT_ENVIRONMENT = 'staging';

function repoUrl(config: ReporterConfig, ref: RepositoryRef): string {
  const base = config.apiBaseUrl.replace(/\/+$/, '');
  return `${base}/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.repo)}`;
}

function postOptions(config: ReporterConfig): PostOptions {
  return {
    token: config.authToken,
    verbose: config.verbose,
    timeoutMs: config.requestTimeoutMs,
  };
}

function parseDeployment(body: string): DeploymentResponse {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ResponseParseError(`unable to parse deployment response: ${reason}`);
  }

  const result = deploymentResponseSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ResponseParseError(`unexpected deployment response: ${issues.join('; ')}`);
  }
  return result.data;
}

// see https://docs.github.com/en/rest/deployments/deployments#create-a-deployment
export async function createDeployment(
  config: ReporterConfig,
  ref: RepositoryRef
): Promise<DeploymentResponse> {
  const payload: DeploymentRequest = {
    required_contexts: [],
    ref: config.commitHash,
    environment: DEPLOYMENT_ENVIRONMENT,
    description: resolveDescription(config.description, config.state, config.buildStatus),
  };

  core.info(`Creating deployment of ${config.commitHash} in ${ref.owner}/${ref.repo}...`);

  const response = await postJson(`${repoUrl(config, ref)}/deployments`, payload, postOptions(config));
  const deployment = parseDeployment(response.body);

  core.info(`deployment id ${deployment.id}`);
  return deployment;
}

// see https://docs.github.com/en/rest/deployments/statuses#create-a-deployment-status
export async function createDeploymentStatus(
  config: ReporterConfig,
  ref: RepositoryRef,
  deploymentId: number
): Promise<DeploymentStatusRequest> {
  const payload: DeploymentStatusRequest = {
    environment_url: config.buildUrl ?? '',
    environment: DEPLOYMENT_ENVIRONMENT,
    state: resolveState(config.state, config.buildStatus),
    description: resolveDescription(config.description, config.state, config.buildStatus),
  };

  core.info(`Setting deployment ${deploymentId} status to ${payload.state}...`);

  await postJson(
    `${repoUrl(config, ref)}/deployments/${deploymentId}/statuses`,
    payload,
    postOptions(config)
  );

  return payload;
}

/**
 * Create the deployment, then attach the final status to it. The second call
 * is addressed by the id the first one returns, so a failed first call ends
 * the run.
 */
export async function reportDeployment(config: ReporterConfig): Promise<DeploymentReport> {
  const ref = parseRepositoryUrl(config.repositoryUrl);

  const deployment = await createDeployment(config, ref);
  const status = await createDeploymentStatus(config, ref, deployment.id);

  return {
    deploymentId: deployment.id,
    deploymentUrl: deployment.url,
    state: status.state,
    description: status.description ?? '',
  };
}
