import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import {
  DEFAULT_HANDOFF_TIMEOUT_MS,
  DEFAULT_IDLE_TIMEOUT_MS,
  initGlobalConfigFile,
  loadResolvedConfig,
  toConfigDisplay,
} from "../src/config.js";
import { withTempEnv } from "./helpers.js";

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

function globalConfigPath(homeDir: string): string {
  return path.join(homeDir, ".config", "voxbridge", "config.json");
}

test("loadResolvedConfig falls back to defaults without config files", async () => {
  await withTempEnv(async ({ homeDir }) => {
    const config = await loadResolvedConfig(homeDir);

    assert.equal(config.minPort, 7500);
    assert.equal(config.maxPort, 7550);
    assert.equal(config.avoidFirewall, false);
    assert.equal(config.idleTimeoutMs, DEFAULT_IDLE_TIMEOUT_MS);
    assert.equal(config.handoffTimeoutMs, DEFAULT_HANDOFF_TIMEOUT_MS);
    assert.equal(config.debug, false);
    assert.equal(config.debugDir, os.tmpdir());
    assert.equal(config.serverName, undefined);
    assert.equal(config.publicHost, os.hostname());
    assert.equal(config.bindHost, undefined);
    assert.equal(config.globalPath, globalConfigPath(homeDir));
    assert.equal(config.projectPath, path.join(homeDir, ".voxbridgerc.json"));
    assert.equal(config.hasGlobalConfig, false);
    assert.equal(config.hasProjectConfig, false);
  });
});

test("loadResolvedConfig layers global, project and application settings", async () => {
  await withTempEnv(async ({ homeDir }) => {
    const cwd = path.join(homeDir, "workspace");
    await writeJson(globalConfigPath(homeDir), {
      minPort: 7600,
      maxPort: 7700,
      timeout: 30,
      debug: true,
      serverName: "global.test",
    });
    await writeJson(path.join(cwd, ".voxbridgerc.json"), {
      maxPort: 7650,
      timeout: null,
      avoidFirewall: true,
      publicHost: " voice.test ",
    });

    const config = await loadResolvedConfig(cwd, { timeout: 2.5, bindHost: "127.0.0.1" });

    assert.equal(config.minPort, 7600);
    assert.equal(config.maxPort, 7650);
    assert.equal(config.idleTimeoutMs, 2_500);
    assert.equal(config.debug, true);
    assert.equal(config.avoidFirewall, true);
    assert.equal(config.serverName, "global.test");
    assert.equal(config.publicHost, "voice.test");
    assert.equal(config.bindHost, "127.0.0.1");
    assert.equal(config.hasGlobalConfig, true);
    assert.equal(config.hasProjectConfig, true);
  });
});

test("loadResolvedConfig raises the default maxPort to a higher minPort", async () => {
  await withTempEnv(async ({ homeDir }) => {
    const config = await loadResolvedConfig(homeDir, { minPort: 9000 });
    assert.equal(config.minPort, 9000);
    assert.equal(config.maxPort, 9000);
  });
});

test("loadResolvedConfig rejects an inverted port range", async () => {
  await withTempEnv(async ({ homeDir }) => {
    await assert.rejects(loadResolvedConfig(homeDir, { minPort: 9000, maxPort: 8000 }), {
      message: "Invalid config: minPort 9000 is greater than maxPort 8000",
    });
  });
});

test("loadResolvedConfig names the file holding an invalid field", async () => {
  await withTempEnv(async ({ homeDir }) => {
    const rcPath = path.join(homeDir, ".voxbridgerc.json");
    await writeJson(rcPath, { maxPort: 70_000 });

    await assert.rejects(loadResolvedConfig(homeDir), {
      message: `Invalid config maxPort in ${rcPath}: expected integer port between 1 and 65535`,
    });
  });
});

test("loadResolvedConfig rejects wrongly typed settings", async () => {
  await withTempEnv(async ({ homeDir }) => {
    await assert.rejects(loadResolvedConfig(homeDir, { timeout: 0 }), {
      message: "Invalid config timeout in application options: expected positive seconds",
    });

    await writeJson(globalConfigPath(homeDir), { debug: "yes" });
    await assert.rejects(loadResolvedConfig(homeDir), {
      message: `Invalid config debug in ${globalConfigPath(homeDir)}: expected boolean`,
    });
  });
});

test("loadResolvedConfig reports unparseable JSON", async () => {
  await withTempEnv(async ({ homeDir }) => {
    const rcPath = path.join(homeDir, ".voxbridgerc.json");
    await fs.writeFile(rcPath, "{ not json", "utf8");

    await assert.rejects(loadResolvedConfig(homeDir), (error: Error) => {
      assert.ok(error.message.startsWith(`Invalid JSON in ${rcPath}: `));
      return true;
    });

    await fs.writeFile(rcPath, "[1, 2]\n", "utf8");
    await assert.rejects(loadResolvedConfig(homeDir), {
      message: `Invalid config in ${rcPath}: expected top-level JSON object`,
    });
  });
});

test("loadResolvedConfig honours XDG_CONFIG_HOME", async () => {
  await withTempEnv(async ({ homeDir }) => {
    const xdgHome = path.join(homeDir, "xdg");
    process.env.XDG_CONFIG_HOME = xdgHome;
    try {
      await writeJson(path.join(xdgHome, "voxbridge", "config.json"), { minPort: 7700 });
      const config = await loadResolvedConfig(homeDir);
      assert.equal(config.globalPath, path.join(xdgHome, "voxbridge", "config.json"));
      assert.equal(config.minPort, 7700);
      assert.equal(config.hasGlobalConfig, true);
    } finally {
      delete process.env.XDG_CONFIG_HOME;
    }
  });
});

test("initGlobalConfigFile writes defaults once", async () => {
  await withTempEnv(async ({ homeDir }) => {
    const first = await initGlobalConfigFile();
    assert.deepEqual(first, { path: globalConfigPath(homeDir), created: true });

    const written: unknown = JSON.parse(await fs.readFile(first.path, "utf8"));
    assert.deepEqual(written, {
      minPort: 7500,
      maxPort: 7550,
      avoidFirewall: false,
      timeout: 60,
      handoffTimeout: 30,
      debug: false,
    });

    const second = await initGlobalConfigFile();
    assert.deepEqual(second, { path: globalConfigPath(homeDir), created: false });
  });
});

test("toConfigDisplay reports timeouts in seconds and unset values as null", async () => {
  await withTempEnv(async ({ homeDir }) => {
    const config = await loadResolvedConfig(homeDir, {
      timeout: 5,
      debugDir: "/tmp/vb",
      publicHost: "voice.test",
    });
    assert.deepEqual(toConfigDisplay(config), {
      minPort: 7500,
      maxPort: 7550,
      avoidFirewall: false,
      timeout: 5,
      handoffTimeout: 30,
      debug: false,
      debugDir: "/tmp/vb",
      serverName: null,
      publicHost: "voice.test",
      bindHost: null,
    });
  });
});
