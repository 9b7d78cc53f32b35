/**
 * Built-in module list, used when no modules file is given.
 */
import type { ModuleDescriptor } from './schema.js';

export const DEFAULT_MODULES: readonly ModuleDescriptor[] = [
  { name: 'secrets-lifecycle', description: 'Secrets Lifecycle Manager (Edge-friendly)' },
  { name: 'fleet-forensics', description: 'Fleet Incident Collector & Forensics Snapper' },
  { name: 'canary-deployer', description: 'Immutable Release Canary Deployer' },
  { name: 'zero-trust-bootstrap', description: 'Zero-Trust Node Bootstrap & Attestor' },
  { name: 'cost-waste-engine', description: 'Cost & Waste Remediation Engine' },
  { name: 'supplychain-monitor', description: 'Supply-chain Integrity Monitor' },
  { name: 'sbom-gen', description: 'SBOM & Dependency Monitor' },
  { name: 'confidential-orchestrator', description: 'Confidential Compute Orchestrator' },
  { name: 'file-distributor', description: 'Secure File Distribution with Verifiable Integrity' },
  { name: 'rbac-sudo-guard', description: 'RBAC-enforced Local Admin Workflow Guard' },
  { name: 'cross-cloud-net', description: 'Cross-Cloud Network Stitching & Diagnostics' },
  { name: 'compliance-packager', description: 'Compliance Evidence Packager' },
  { name: 'edge-observability', description: 'Edge-First Observability Injector' },
  { name: 'data-residency', description: 'Data Residency Enforcer' },
  { name: 'dev-ephemeral-envs', description: 'Developer Productivity Ops (On-demand Dev Envs)' },
];
