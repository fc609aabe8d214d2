import * as core from '@actions/core';
import { getConfig, printConfig } from './config';
import { reportDeployment } from './deployments';

async function run(): Promise<void> {
  try {
    const config = getConfig();
    printConfig(config);

    const report = await reportDeployment(config);

    core.info(`Deployment ${report.deploymentId} reported as ${report.state}`);
    core.setOutput('deployment_id', report.deploymentId);
    core.setOutput('deployment_url', report.deploymentUrl);
    core.setOutput('state', report.state);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(`Error: ${error.message}`);
    } else {
      core.setFailed('An unexpected error occurred');
    }
  }
}

void run();
