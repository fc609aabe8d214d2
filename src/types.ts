import { z } from 'zod';

export const DEPLOYMENT_STATES = ['pending', 'success', 'error', 'failure'] as const;

export type DeploymentState = (typeof DEPLOYMENT_STATES)[number];

export type StatusPreset = 'auto' | DeploymentState;

export interface ReporterConfig {
  readonly authToken: string;
  readonly repositoryUrl: string;
  readonly commitHash: string;
  readonly apiBaseUrl: string;
  readonly state: StatusPreset;
  readonly buildUrl?: string;
  readonly statusIdentifier?: string;
  readonly description?: string;
  readonly verbose: boolean;
  // Exit-code-like signal from the CI runner, "0" means the build passed
  readonly buildStatus?: string;
  readonly requestTimeoutMs: number;
}

export interface RepositoryRef {
  owner: string;
  repo: string;
}

export interface DeploymentRequest {
  required_contexts: string[];
  ref: string;
  environment: string;
  state?: DeploymentState;
  target_url?: string;
  description?: string;
  context?: string;
}

export interface DeploymentStatusRequest {
  environment_url: string;
  environment: string;
  state: DeploymentState;
  description?: string;
}

export const deploymentResponseSchema = z.object({
  id: z.number().int(),
  url: z.string(),
});

export type DeploymentResponse = z.infer<typeof deploymentResponseSchema>;

export interface DeploymentReport {
  deploymentId: number;
  deploymentUrl: string;
  state: DeploymentState;
  description: string;
}
