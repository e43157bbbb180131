import { describe, it, expect } from "vitest";
import {
  ACTIVE_CONNECTIONS_ARGS,
  discoverActiveConnection,
  parseActiveConnection,
  restartConnection,
} from "../connection.js";
import { DnsSwapError } from "../../errors.js";
import { createFakeRunner, createTestNmcli } from "../../session/__tests__/test-helpers.js";

describe("parseActiveConnection", () => {
  it("returns the first connection bound to a device", () => {
    expect(parseActiveConnection("conn1:eth0\nconn2:\nconn3:wlan0")).toBe("conn1");
  });

  it("skips leading lines without a device", () => {
    expect(parseActiveConnection("lo-ish:\nconn3:wlan0\nconn1:eth0\n")).toBe("conn3");
  });

  it("fails when no line has a device", () => {
    expect(() => parseActiveConnection("conn1:\nconn2:\n")).toThrow("No active connection found");
  });

  it("fails on empty output", () => {
    try {
      parseActiveConnection("");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DnsSwapError);
      expect((err as DnsSwapError).code).toBe("DISCOVERY_FAILED");
    }
  });

  it("ignores lines with a single field", () => {
    expect(parseActiveConnection("garbage\nwired:enp3s0")).toBe("wired");
  });
});

describe("discoverActiveConnection", () => {
  it("queries nmcli without sudo", async () => {
    const { runner, calls } = createFakeRunner(() => ({ stdout: "Home WiFi:wlan0\n" }));
    const name = await discoverActiveConnection(createTestNmcli(runner));

    expect(name).toBe("Home WiFi");
    expect(calls).toEqual([
      { command: "nmcli", args: [...ACTIVE_CONNECTIONS_ARGS], passthrough: false },
    ]);
  });

  it("fails when nmcli exits non-zero", async () => {
    const { runner } = createFakeRunner(() => ({
      exitCode: 8,
      stderr: "Error: NetworkManager is not running.\n",
    }));

    await expect(discoverActiveConnection(createTestNmcli(runner))).rejects.toThrow(
      "Failed to get active connections",
    );
  });

  it("fails when the listing is not valid UTF-8", async () => {
    // "c\xff:eth0\n"
    const bytes = Buffer.from([0x63, 0xff, 0x3a, 0x65, 0x74, 0x68, 0x30, 0x0a]);
    const { runner } = createFakeRunner(() => ({
      stdout: bytes.toString("utf8"),
      stdoutBytes: bytes,
    }));

    await expect(discoverActiveConnection(createTestNmcli(runner))).rejects.toMatchObject({
      code: "DISCOVERY_FAILED",
      message: "Active connection list is not valid UTF-8",
    });
  });

  it("accepts non-ASCII connection names", async () => {
    const { runner } = createFakeRunner(() => ({ stdout: "Café WLAN:wlan0\n" }));

    await expect(discoverActiveConnection(createTestNmcli(runner))).resolves.toBe("Café WLAN");
  });

  it("fails when nmcli cannot be started", async () => {
    const { runner } = createFakeRunner(() => ({ exitCode: null, stderr: "spawn nmcli ENOENT" }));

    await expect(discoverActiveConnection(createTestNmcli(runner))).rejects.toMatchObject({
      code: "DISCOVERY_FAILED",
    });
  });
});

describe("restartConnection", () => {
  it("brings the connection down then up with sudo", async () => {
    const { runner, calls } = createFakeRunner();
    await restartConnection(createTestNmcli(runner), "Home WiFi");

    expect(calls.map((c) => [c.command, ...c.args])).toEqual([
      ["sudo", "nmcli", "connection", "down", "Home WiFi"],
      ["sudo", "nmcli", "connection", "up", "Home WiFi"],
    ]);
  });

  it("still brings the connection up when down fails", async () => {
    const { runner, calls } = createFakeRunner((_, args) =>
      args.includes("down") ? { exitCode: 10, stderr: "not an active connection" } : undefined,
    );

    await restartConnection(createTestNmcli(runner), "eth");
    expect(calls.map((c) => c.args[2])).toEqual(["down", "up"]);
  });

  it("still brings the connection up when the down runner throws", async () => {
    const { runner: base, calls } = createFakeRunner();
    const runner = {
      ...base,
      run: async (command: string, args: string[]) => {
        if (args.includes("down")) throw new Error("boom");
        return base.run(command, args);
      },
    };

    await restartConnection(createTestNmcli(runner), "eth");
    expect(calls.map((c) => c.args[2])).toEqual(["up"]);
  });

  it("reports the diagnostic text when up fails", async () => {
    const { runner } = createFakeRunner((_, args) =>
      args.includes("up")
        ? { exitCode: 4, stderr: "Error: Connection activation failed: IP configuration could not be reserved\n" }
        : undefined,
    );

    await expect(restartConnection(createTestNmcli(runner), "eth")).rejects.toThrow(
      "Failed to restart connection: Error: Connection activation failed: IP configuration could not be reserved",
    );
  });
});
