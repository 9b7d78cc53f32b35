/**
 * Template bodies for generated module files.
 *
 * Each body is a pure function of the module's name and description. Shell
 * variables inside the bodies are escaped (\${...}) so only the module fields
 * are substituted.
 */
import { stringifyYaml } from '../../utils/yaml.js';

export interface TemplateContext {
  /** Module name, e.g. "secrets-lifecycle" */
  name: string;
  description: string;
  /** Java package segment, e.g. "secretslifecycle" */
  javaSegment: string;
  /** Java class prefix, e.g. "SecretsLifecycle" */
  className: string;
}

export const JAVA_GROUP = 'com.modboot';

export const readme = (t: TemplateContext): string => `# ${t.name}

${t.description}

## Overview
This is a generated scaffold intended for enterprise integration. It includes:
- hardened bash entrypoint
- configuration templates (etc/)
- packaging scripts
- CI workflow (ci/)
- Dockerfile and Kubernetes manifest stubs
- embedded service stub (java/)

## Quickstart
1. Update etc/default.conf with your endpoints and secure storage references.
2. Run: bin/entrypoint.sh --help
3. Run tests: ./tests/run_tests.sh
`;

export const entrypoint = (): string => `#!/usr/bin/env bash
# CLI entrypoint for module
set -euo pipefail
IFS=$'\\n\\t'
PROG_NAME="$(basename "$0")"

usage() {
  cat <<USAGE
Usage: $PROG_NAME [--help] [--run] [--config FILE] [--dry-run]

Options:
  --help        Show help
  --run         Execute main flow
  --config FILE Path to config (default: etc/default.conf)
  --dry-run     Validate configs and exit
USAGE
}

log() { printf '%s [INFO] %s\\n' "$(date -u +'%Y-%m-%dT%H:%M:%SZ')" "$*"; }
err() { printf '%s [ERROR] %s\\n' "$(date -u +'%Y-%m-%dT%H:%M:%SZ')" "$*" >&2; }

die() { err "$*"; exit 1; }

main() {
  local cfg="\${CFG:-etc/default.conf}"
  if [[ ! -f "$cfg" ]]; then
    die "Missing config: $cfg"
  fi
  # shellcheck disable=SC1090
  source "$cfg"
  log "Loaded config: $cfg"

  if [[ "\${DRY_RUN:-0}" == "1" ]]; then
    log "Dry run - config validated"
    return 0
  fi

  if [[ -f lib/utils.sh ]]; then
    # shellcheck disable=SC1091
    source lib/utils.sh
  fi

  log "Module main flow executed (placeholder)."
  return 0
}

if [[ $# -eq 0 ]]; then usage; exit 0; fi
while [[ $# -gt 0 ]]; do
  case "$1" in
    --help) usage; exit 0 ;;
    --run) shift; main; exit $? ;;
    --config) CFG="$2"; shift 2 ;;
    --dry-run) DRY_RUN=1; shift ;;
    *) echo "Unknown arg: $1" >&2; usage; exit 2 ;;
  esac
done
`;

export const defaultConfig = (t: TemplateContext): string => `# Default configuration for ${t.name}
BACKEND_ENDPOINT="https://api.example.local"
LOG_PATH="/var/log/modboot/${t.name}.log"
MAX_RETRIES=3
RETRY_BASE_SEC=2
`;

export const utilsLib = (): string => `#!/usr/bin/env bash
set -euo pipefail
IFS=$'\\n\\t'

# HTTP GET with exponential backoff
http_get() {
  local url="$1" out=\${2:-/dev/null} retries=\${3:-3}
  local backoff=1 i=0
  while :; do
    if curl -fsS --max-time 30 "$url" -o "$out"; then
      return 0
    fi
    i=$((i+1))
    if [[ $i -ge $retries ]]; then return 1; fi
    sleep "$backoff"
    backoff=$((backoff*2))
  done
}

# JSON extract helper; requires jq
json_get() { jq -r "$1" <"$2"; }
`;

export const metricsLib = (t: TemplateContext): string => `#!/usr/bin/env bash
# File-based metrics and healthcheck shim
set -euo pipefail
IFS=$'\\n\\t'
METRICS_FILE="/var/run/modboot/${t.name}_metrics.prom"
health() { echo "ok"; }
emit_metric() { echo "\${1} \${2:-1}" >> "\${METRICS_FILE}"; }
`;

export const dockerfile = (t: TemplateContext): string => `FROM ubuntu:22.04
LABEL org.opencontainers.image.title="${t.name}"
LABEL org.opencontainers.image.description="${t.description.replace(/"/g, '\\"')}"
ENV LANG=C.UTF-8
RUN apt-get update && apt-get install -y --no-install-recommends \\
    bash curl ca-certificates \\
  && rm -rf /var/lib/apt/lists/*
COPY bin/ /opt/modboot/${t.name}/bin/
COPY etc/ /opt/modboot/${t.name}/etc/
COPY lib/ /opt/modboot/${t.name}/lib/
WORKDIR /opt/modboot/${t.name}
ENTRYPOINT ["/opt/modboot/${t.name}/bin/entrypoint.sh"]
CMD ["--help"]
`;

export const k8sManifest = (t: TemplateContext): string =>
  stringifyYaml({
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: t.name, labels: { app: t.name } },
    spec: {
      replicas: 1,
      selector: { matchLabels: { app: t.name } },
      template: {
        metadata: { labels: { app: t.name } },
        spec: {
          containers: [
            {
              name: t.name,
              image: `registry.example.local/${t.name}:latest`,
              args: ['--run'],
              env: [
                {
                  name: 'BACKEND_ENDPOINT',
                  valueFrom: { configMapKeyRef: { name: `${t.name}-cfg`, key: 'BACKEND_ENDPOINT' } },
                },
              ],
            },
          ],
        },
      },
    },
  });

export const ciWorkflow = (t: TemplateContext): string =>
  stringifyYaml({
    name: `CI ${t.name}`,
    on: ['push', 'pull_request'],
    jobs: {
      test: {
        'runs-on': 'ubuntu-latest',
        steps: [
          { uses: 'actions/checkout@v4' },
          { name: 'Run tests', run: 'chmod +x tests/run_tests.sh\n./tests/run_tests.sh\n' },
        ],
      },
    },
  });

export const testStub = (t: TemplateContext): string => `#!/usr/bin/env bash
# Smoke tests for ${t.name}
set -euo pipefail
IFS=$'\\n\\t'
PROG="\${PROG:-$(pwd)/bin/entrypoint.sh}"
if [[ ! -x "$PROG" ]]; then echo "Missing: $PROG" >&2; exit 2; fi
"$PROG" --help >/dev/null
tmp_cfg="$(mktemp)"
trap 'rm -f "$tmp_cfg"' EXIT
cp etc/default.conf "$tmp_cfg"
"$PROG" --config "$tmp_cfg" --dry-run --run
echo "OK"
`;

export const packagingScript = (t: TemplateContext): string => `#!/usr/bin/env bash
# Package ${t.name} into a tarball next to the module directory
set -euo pipefail
ROOT_DIR="$(cd "$(dirname "\${BASH_SOURCE[0]}")/.." && pwd)"
OUT="\${ROOT_DIR}/../${t.name}-$(date -u +'%Y%m%dT%H%M%SZ').tar.gz"
if [[ -d "\${ROOT_DIR}/java" ]] && command -v mvn >/dev/null 2>&1; then
  (cd "\${ROOT_DIR}/java" && mvn -q -DskipTests package)
fi
tar -czf "\${OUT}" -C "\${ROOT_DIR}" .
echo "Created: \${OUT}"
`;

export const securityAdvisory = (t: TemplateContext): string => `# Security Advisory - ${t.name}

- DO NOT store production secrets in etc/; use environment variables or a secret store.
- Ensure TLS verification and pin certificates where possible.
- Use HSM/KMS-backed keys for signing and encryption.
- Conduct a security review before production deployment.
`;

export const implementationNotes = (t: TemplateContext): string => `# Implementation Notes - ${t.name}

${t.description}

- bin/entrypoint.sh is the only supported entrypoint; keep flags backwards compatible.
- java/ holds the embedded service stub (${JAVA_GROUP}.${t.javaSegment}.${t.className}Service).
- packaging/SHASUMS256.txt lists the SHA-256 of every file in this module.
`;

export const servicePom = (t: TemplateContext): string => `<?xml version="1.0" encoding="UTF-8"?>
<project xmlns="http://maven.apache.org/POM/4.0.0"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"
         xsi:schemaLocation="http://maven.apache.org/POM/4.0.0 https://maven.apache.org/xsd/maven-4.0.0.xsd">
  <modelVersion>4.0.0</modelVersion>
  <groupId>${JAVA_GROUP}</groupId>
  <artifactId>${t.name}</artifactId>
  <version>0.1.0</version>
  <packaging>jar</packaging>
  <properties>
    <maven.compiler.release>17</maven.compiler.release>
    <project.build.sourceEncoding>UTF-8</project.build.sourceEncoding>
  </properties>
  <dependencies>
    <dependency>
      <groupId>junit</groupId>
      <artifactId>junit</artifactId>
      <version>4.13.2</version>
      <scope>test</scope>
    </dependency>
  </dependencies>
</project>
`;

export const serviceStub = (t: TemplateContext): string => `package ${JAVA_GROUP}.${t.javaSegment};

/**
 * ${t.className}Service - ${t.description}
 */
public class ${t.className}Service {
    public void start() {
        System.out.println("${t.name} service started");
    }
}
`;

// Top-level artifacts

export const topReadme = (): string => `# Generated Modules

This directory was generated by modboot.
Customize each module's etc/* files and follow docs/ before deploying to production.

- packaging/SHASUMS256.txt lists the SHA-256 of every file in the tree.
- packaging/<module>.tar.gz holds one archive per module.
`;

export const packagingManifest = (modules: ReadonlyArray<{ name: string; description: string }>): string =>
  `Modules:\n${modules.map((m) => `${m.name}: ${m.description}\n`).join('')}`;

export const runAllTests = (): string => `#!/usr/bin/env bash
set -euo pipefail
IFS=$'\\n\\t'
ROOT="$(cd "$(dirname "\${BASH_SOURCE[0]}")" && pwd)"
for d in "$ROOT"/*; do
  if [[ -d "$d" && -f "$d/tests/run_tests.sh" ]]; then
    echo "== Testing $(basename "$d") =="
    (cd "$d" && ./tests/run_tests.sh) || { echo "Fail: $(basename "$d")"; exit 1; }
  fi
done
echo "All module smoke tests completed."
`;
