/**
 * Mock Deployment Provider
 */

import { DeploymentOutcome, DeploymentProvider } from '../types.js';

export class MockDeploymentProvider implements DeploymentProvider {
  private deployments = 0;

  public async deploy(agentId: string, environment: string, replicas: number): Promise<DeploymentOutcome> {
    this.deployments++;
    return {
      deploymentId: `dep-${agentId}-${environment}-${this.deployments}`,
      endpoint: `https://${environment}.agents.local/${agentId}`,
      healthCheck: replicas > 0 ? 'passing' : 'failing'
    };
  }

  public get deploymentCount(): number {
    return this.deployments;
  }
}
