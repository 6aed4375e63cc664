#!/usr/bin/env node
/**
 * SSH Web Bridge - Main Entry Point
 *
 * Browser terminals and file transfer for SSH targets whose credentials are
 * sealed under client key material and a server secret.
 */

import { loadConfig, validateConfig } from './config.js';
import { setLogLevel, createLogger } from './logger.js';
import { JsonTargetStore } from './store/target-store.js';
import { CredentialVault } from './vault/credential-vault.js';
import { SSHConnector } from './ssh/connector.js';
import { HostIdentityLedger } from './ssh/host-key.js';
import { FileAuditSink } from './audit/audit.js';
import { SessionRegistry } from './bridge/session-registry.js';
import { StaticTokenAuthenticator } from './web/auth.js';
import { FileService } from './web/files.js';
import { WebServer } from './web/server.js';

const log = createLogger('main');

async function main() {
  log.info('SSH Web Bridge starting...');

  // Load configuration
  const configPath = process.env.SSH_BRIDGE_CONFIG;
  const config = await loadConfig(configPath);
  setLogLevel(config.logging.level);

  // Validate configuration
  const validation = validateConfig(config);
  if (!validation.valid) {
    log.error('Configuration errors:');
    for (const error of validation.errors) {
      log.error(`  - ${error}`);
    }
    process.exit(1);
  }

  if (config.auth.tokens.length === 0) {
    log.warn('No API tokens configured; every request will be rejected');
  }

  const store = new JsonTargetStore(config.storage.targetsPath);
  const vault = new CredentialVault(config.security.serverSecret);
  const connector = new SSHConnector();
  const audit = new FileAuditSink(config.storage.auditPath);
  const registry = new SessionRegistry();

  const files = new FileService({
    store,
    vault,
    connector,
    audit,
    readyTimeoutMs: config.ssh.readyTimeoutMs,
  });

  const webServer = new WebServer(config, {
    store,
    vault,
    connector,
    ledger: new HostIdentityLedger(store),
    audit,
    registry,
    authenticator: new StaticTokenAuthenticator(config.auth.tokens),
    files,
  });
  await webServer.start();

  // Handle graceful shutdown
  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, closing ${registry.size} session(s)...`);
    webServer.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('Error during shutdown:', error);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
