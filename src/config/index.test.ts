import { describe, expect, it } from "vitest";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.logLevel).toBe("info");
    expect(config.logFormat).toBe("json");
    expect(config.stateDbPath).toBe("./.state/provisioner.db");
    expect(config.cacheDir).toBeUndefined();
    expect(config.robot).toEqual({ baseUrl: "https://robot-ws.your-server.de", timeoutSeconds: 30 });
    expect(config.ssh).toEqual({ user: "root", readyTimeoutMs: 180_000 });
    expect(config.provisioning).toEqual({
      rescueWaitMs: 1_200_000,
      osWaitMs: 1_200_000,
      osWaitExtensionMs: 900_000,
      pollIntervalMs: 5_000,
      attemptTimeoutMs: 5_000,
      rebootGraceMs: 10_000,
    });
    expect(config.privateNetwork.rangeStart).toBe("10.1.0.2");
    expect(config.privateNetwork.rangeEnd).toBe("10.1.0.127");
  });

  it("reads and coerces environment values", () => {
    const config = loadConfig({
      HROBOT_USERNAME: "robot-user",
      HROBOT_PASSWORD: "test-secret",
      HROBOT_TIMEOUT_SECONDS: "45",
      SSH_AUTH_SOCK: "/tmp/agent.sock",
      OS_WAIT_EXTENSION_MS: "0",
      PRIVATE_VLAN_ID: "4010",
    });

    expect(config.robot).toMatchObject({ username: "robot-user", password: "test-secret", timeoutSeconds: 45 });
    expect(config.ssh.agentSocket).toBe("/tmp/agent.sock");
    expect(config.provisioning.osWaitExtensionMs).toBe(0);
    expect(config.privateNetwork.vlanId).toBe(4010);
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ HROBOT_BASE_URL: "", SSH_AUTH_SOCK: "" }).robot.baseUrl).toBe(
      "https://robot-ws.your-server.de",
    );
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PRIVATE_VLAN_ID: "12" })).toThrow();
    expect(() => loadConfig({ PRIVATE_GATEWAY: "not-an-ip" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ LOG_FORMAT: "yaml" })).toThrow();
    expect(loadConfig({ LOG_FORMAT: "pretty" }).logFormat).toBe("pretty");
  });
});
