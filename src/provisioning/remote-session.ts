import { NodeSSH } from "node-ssh";
import { logger } from "../config/logger.js";

export type SessionAuth = { kind: "agent"; socket: string } | { kind: "password"; password: string };

export interface SessionOptions {
  host: string;
  /** Default 22 */
  port?: number;
  username: string;
  auth: SessionAuth;
  /** Handshake timeout. Default 180000 */
  readyTimeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

/** A remote command exited non-zero. Carries everything needed to explain why. */
export class RemoteCommandError extends Error {
  readonly name = "RemoteCommandError" as const;
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly stdout: string,
  ) {
    super(`Remote command exited with ${exitCode ?? "signal"}: ${command}${stderr ? `\n${stderr.trim()}` : ""}`);
  }
}

/** The slice of an SFTP channel used for uploads. */
export interface SftpChannel {
  writeFile(path: string, data: string, options: { mode: number }, callback: (err?: Error | null) => void): void;
  end(): void;
}

export interface SshConnectConfig {
  host: string;
  port: number;
  username: string;
  agent?: string;
  password?: string;
  readyTimeout: number;
}

/** The slice of the node-ssh client this module drives. */
export interface SshClient {
  connect(config: SshConnectConfig): Promise<unknown>;
  execCommand(command: string): Promise<CommandResult>;
  requestSFTP(): Promise<SftpChannel>;
  dispose(): void;
}

/** What the provisioning pipeline needs from an open session. */
export interface IRemoteSession {
  /** Run a command; resolves with stdout, throws RemoteCommandError on a non-zero exit. */
  run(command: string): Promise<string>;
  /** Run a command and return its result whatever the exit status. */
  runUnchecked(command: string): Promise<CommandResult>;
  /** Write `data` to `path` with the given permission bits. */
  upload(path: string, data: string, mode: number): Promise<void>;
  close(): void;
}

export type SessionOpener = (options: SessionOptions) => Promise<IRemoteSession>;

/**
 * Authenticated command and file-transfer session over SSH.
 *
 * Host keys are not verified: the rescue system and the freshly imaged OS
 * present new keys on every provisioning run.
 */
export class RemoteSession implements IRemoteSession {
  private closed = false;

  private constructor(
    private readonly client: SshClient,
    readonly host: string,
  ) {}

  static async connect(
    options: SessionOptions,
    createClient: () => SshClient = () => new NodeSSH(),
  ): Promise<RemoteSession> {
    const client = createClient();
    const port = options.port ?? 22;
    await client.connect({
      host: options.host,
      port,
      username: options.username,
      readyTimeout: options.readyTimeoutMs ?? 180_000,
      ...(options.auth.kind === "agent" ? { agent: options.auth.socket } : { password: options.auth.password }),
    });
    logger.info(`SSH session open to ${options.host}:${port}`, { user: options.username, auth: options.auth.kind });
    return new RemoteSession(client, options.host);
  }

  async run(command: string): Promise<string> {
    const result = await this.runUnchecked(command);
    if (result.code !== 0) {
      throw new RemoteCommandError(command, result.code, result.stderr, result.stdout);
    }
    return result.stdout;
  }

  async runUnchecked(command: string): Promise<CommandResult> {
    this.assertOpen();
    const { stdout, stderr, code } = await this.client.execCommand(command);
    return { stdout, stderr, code };
  }

  async upload(path: string, data: string, mode: number): Promise<void> {
    this.assertOpen();
    const sftp = await this.client.requestSFTP();
    try {
      await new Promise<void>((resolve, reject) => {
        sftp.writeFile(path, data, { mode }, (err) => (err ? reject(err) : resolve()));
      });
    } finally {
      sftp.end();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.client.dispose();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error(`SSH session to ${this.host} is closed`);
  }
}

export const openRemoteSession: SessionOpener = (options) => RemoteSession.connect(options);
