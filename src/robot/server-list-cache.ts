import type { RobotClient } from "./robot-client.js";
import type { ServerInfo } from "./types.js";

/**
 * One bulk `GET /server` per process run. Concurrent readers share the same
 * in-flight request; a failed fetch is not cached so the next reader retries.
 */
export class ServerListCache {
  private pending: Promise<ServerInfo[]> | null = null;

  constructor(private readonly client: Pick<RobotClient, "listAllServers">) {}

  async list(): Promise<ServerInfo[]> {
    if (!this.pending) {
      const request = this.client.listAllServers();
      this.pending = request;
      request.catch(() => {
        if (this.pending === request) this.pending = null;
      });
    }
    const servers = await this.pending;
    return servers.map((s) => ({ ...s }));
  }

  /** Look a server up in the bulk list. Null when the account has no such server. */
  async get(serverNumber: number): Promise<ServerInfo | null> {
    const servers = await this.list();
    return servers.find((s) => s.serverNumber === serverNumber) ?? null;
  }
}
