// Core type definitions for SSH Web Bridge

export type AuthType = 'password' | 'key';

/**
 * Decrypted access credential. Lives only in memory for the duration of a
 * connection attempt and is never logged.
 */
export interface Credential {
  password?: string;
  privateKey?: string;        // PEM / OpenSSH format
  passphrase?: string;
}

export interface EncryptedCredential {
  salt: Uint8Array;           // 16 bytes
  nonce: Uint8Array;          // 12 bytes
  ciphertext: Uint8Array;     // AES-256-GCM output with the 16-byte tag appended
}

// On-disk form of EncryptedCredential
export interface StoredEnvelope {
  salt: string;               // base64
  nonce: string;              // base64
  ciphertext: string;         // base64
}

export type HostKeyStatus = 'new' | 'match' | 'mismatch';

export interface Target {
  id: string;
  ownerId: string;
  name: string;               // "web-01"
  host: string;               // "10.0.0.12"
  port: number;               // 22
  username: string;
  authType: AuthType;
  credential: StoredEnvelope;
  hostFingerprint: string;    // "" until the first confirmed connection
  createdAt: number;
  updatedAt: number;
}

export interface TargetFile {
  version: 1;
  targets: Target[];
}

export interface FileInfo {
  name: string;
  path: string;               // absolute remote path
  size: number;
  mode: string;               // "drwxr-xr-x"
  modTime: number;            // unix seconds
  isDir: boolean;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ApiToken {
  token: string;
  owner: string;
}

export interface Config {
  server: {
    host: string;
    port: number;
    corsOrigin: string;
  };
  storage: {
    targetsPath: string;
    auditPath: string;
  };
  security: {
    serverSecret: string;
  };
  ssh: {
    readyTimeoutMs: number;
    keepaliveIntervalMs: number;
  };
  bridge: {
    authTimeoutMs: number;
    hostKeyTimeoutMs: number;
    closeGraceMs: number;
    outputChunkSize: number;
    initialRows: number;
    initialCols: number;
  };
  auth: {
    tokens: ApiToken[];
  };
  logging: {
    level: LogLevel;
  };
}
