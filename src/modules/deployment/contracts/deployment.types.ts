/**
 * DEPLOYMENT CONTRACTS
 *
 * A deployment is an immutable record binding a READY run to a version
 * label. Which deployment serves traffic is held by a per-project
 * pointer; status is derived from it when read.
 */

export type DeploymentStatus = 'pending' | 'active' | 'retired';

export interface DeploymentRecord {
  deploymentId: string;
  tenantId: string;
  projectId: string;
  trainingRunId: string;
  versionLabel: string;
  artifactPath: string;          // package directory of the run
  endpointRef: string;
  evalReportId: string;
  goNoGo: boolean;
  activatedBy: string;
  createdAt: Date;
  activatedAt: Date | null;     // first activation
}

export interface Deployment extends DeploymentRecord {
  status: DeploymentStatus;
}

export interface DeploymentPointer {
  projectId: string;
  tenantId: string;
  activeDeploymentId: string | null;
  previousDeploymentId: string | null;
  revision: number;
  updatedAt: Date;
}

export interface ActivateRequest {
  tenantId: string;
  projectId: string;
  trainingRunId: string;
  versionLabel: string;
  endpointRef?: string;
  actorId: string;
}

export interface GroundingSnippet {
  sourceId: string;
  text: string;
  score: number;
}

export interface GroundingSource {
  id: string;
  text: string;
}

export interface GenerateRequest {
  prompt: string;
  snippets: GroundingSnippet[];
  artifactPath: string | null;
  versionLabel: string | null;
}

export interface GenerateResult {
  text: string;
  model: string;
}

export interface InferenceBackend {
  readonly name: 'mock' | 'ollama';
  generate(request: GenerateRequest): Promise<GenerateResult>;
}

export interface InferRequest {
  tenantId: string;
  projectId: string;
  prompt: string;
  sources: GroundingSource[];
}

export interface InferResponse {
  answer: string;
  refused: boolean;
  deploymentId: string;
  versionLabel: string;
  citations: GroundingSnippet[];
  model: string;
}
