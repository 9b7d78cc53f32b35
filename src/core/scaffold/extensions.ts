/**
 * Module-specific scaffold extensions.
 */
import type { ModuleDescriptor } from '../registry/schema.js';
import type { ArtifactSpec } from '../templates/renderer.js';
import { JAVA_GROUP } from '../templates/bodies.js';
import type { ScaffoldExtension } from './types.js';

const SECRETS_PACKAGE = `${JAVA_GROUP}.secrets`;
const SECRETS_PATH = SECRETS_PACKAGE.replace(/\./g, '/');

const HVAC_CLIENT = `#!/usr/bin/env python3
"""
Secret-store integration example using 'hvac'.

Expects VAULT_ADDR and VAULT_TOKEN from the environment or a mounted
service account. Never embed tokens in this file.
"""
import os
import sys

try:
    import hvac
except ImportError:
    print('The hvac library is required. Install with: pip install hvac', file=sys.stderr)
    sys.exit(2)

VAULT_ADDR = os.environ.get('VAULT_ADDR')
VAULT_TOKEN = os.environ.get('VAULT_TOKEN')

if not VAULT_ADDR or not VAULT_TOKEN:
    print('VAULT_ADDR and VAULT_TOKEN must be set', file=sys.stderr)
    sys.exit(2)

client = hvac.Client(url=VAULT_ADDR, token=VAULT_TOKEN)

if not client.is_authenticated():
    print('Failed to authenticate to Vault', file=sys.stderr)
    sys.exit(2)

print('Vault client authenticated.')
`;

const VAULT_CLIENT_STUB = `package ${SECRETS_PACKAGE};

/**
 * Minimal secret-store client interface. Back it with a vetted Vault driver
 * and TLS/mTLS authentication from externalized config.
 */
public interface VaultClientStub {
    String getSecret(String path) throws Exception;
}
`;

const VAULT_CLIENT_STUB_TEST = `package ${SECRETS_PACKAGE};

import org.junit.Test;
import static org.junit.Assert.*;

public class VaultClientStubTest {
    @Test
    public void stubCanBeImplemented() {
        VaultClientStub client = path -> "value-for-" + path;
        try {
            assertEquals("value-for-app", client.getSecret("app"));
        } catch (Exception e) {
            fail(e.getMessage());
        }
    }
}
`;

const VAULT_GUIDANCE = `# Vault Integration Guidance

- Prefer AppRole, Kubernetes auth, or mTLS for production authentication.
- Avoid long-lived tokens; use short-lived credentials and rotate often.
- Use HSM-backed keys for signing and encryption operations.
- Validate Vault ACLs and policies to enforce least privilege.
`;

function text(kind: string, relativePath: string, body: string, executable = false): ArtifactSpec {
  return { kind, relativePath, content: Buffer.from(body, 'utf-8'), executable };
}

/**
 * Secret-store client stubs and guidance for the secrets-lifecycle module.
 */
export const secretStoreExtension: ScaffoldExtension = {
  moduleName: 'secrets-lifecycle',
  description: 'secret-store integration stubs',
  artifacts: (_module: ModuleDescriptor) => [
    text('secret-store-client', 'bin/secrets_hvac.py', HVAC_CLIENT, true),
    text('secret-store-interface', `java/src/main/java/${SECRETS_PATH}/VaultClientStub.java`, VAULT_CLIENT_STUB),
    text('secret-store-test', `java/src/test/java/${SECRETS_PATH}/VaultClientStubTest.java`, VAULT_CLIENT_STUB_TEST),
    text('secret-store-guidance', 'docs/VAULT_INTEGRATION.md', VAULT_GUIDANCE),
  ],
};

export const DEFAULT_EXTENSIONS: readonly ScaffoldExtension[] = [secretStoreExtension];
