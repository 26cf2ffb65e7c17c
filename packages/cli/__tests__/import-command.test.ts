/**
 * kubeimport import command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  SchemaResolver,
  parseSchemaDocument,
  type ImportDependencies,
  type ObjectStore,
  type TypeRegistry,
} from "@kubeimport/core";
import {
  gvkKey,
  type EndpointDescriptor,
  type GroupVersionKind,
  type JsonObject,
} from "@kubeimport/types";
import { EXIT_CODES, createProgram } from "../src/cli.js";
import { exitCodeForFailure, type ImportCommandRuntime } from "../src/commands/import.js";
import { toConnection } from "../src/services/dependencies.js";
import type { KubeimportConfig } from "../src/utils/config.js";
import { configureLogger } from "../src/utils/logger.js";

const SCHEMAS = `
schemas:
  v1/ConfigMap:
    type: object
    attributes:
      apiVersion: string
      kind: string
      metadata:
        type: object
        attributes:
          name: string
          namespace: string
      data:
        type: map
        value: string
    optional: [data]
`;

const configMaps: EndpointDescriptor = {
  group: "",
  version: "v1",
  kind: "ConfigMap",
  resource: "configmaps",
  namespaced: true,
};

class SingleTypeRegistry implements TypeRegistry {
  async lookupEndpoint(gvk: GroupVersionKind): Promise<EndpointDescriptor | undefined> {
    return gvkKey(gvk) === gvkKey(configMaps) ? configMaps : undefined;
  }

  async isNamespaceScoped(gvk: GroupVersionKind): Promise<boolean | undefined> {
    return (await this.lookupEndpoint(gvk))?.namespaced;
  }
}

class MapObjectStore implements ObjectStore {
  readonly objects = new Map<string, JsonObject>();

  async get(
    endpoint: EndpointDescriptor,
    namespace: string | undefined,
    name: string
  ): Promise<JsonObject | undefined> {
    return this.objects.get(`${endpoint.resource}/${namespace ?? ""}/${name}`);
  }
}

const settings: JsonObject = {
  apiVersion: "v1",
  kind: "ConfigMap",
  metadata: { name: "settings", namespace: "default", uid: "u-1", resourceVersion: "42" },
  data: { mode: "fast" },
};

const expectedValue = {
  manifest: {},
  object: {
    apiVersion: "v1",
    kind: "ConfigMap",
    metadata: { name: "settings", namespace: "default" },
    data: { mode: "fast" },
  },
  wait_for: null,
};

function written(spy: { mock: { calls: unknown[][] } }): string {
  return spy.mock.calls.map((args) => String(args[0])).join("");
}

describe("kubeimport import", () => {
  let tempDir: string;
  let originalCwd: string;
  let store: MapObjectStore;
  let runtime: ImportCommandRuntime;

  beforeEach(() => {
    originalCwd = process.cwd();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "kubeimport-import-"));
    process.chdir(tempDir);
    for (const name of [
      "KUBEIMPORT_SERVER",
      "KUBEIMPORT_TOKEN",
      "KUBEIMPORT_SCHEMA_FILE",
      "KUBEIMPORT_TIMEOUT_MS",
      "KUBEIMPORT_LOG_LEVEL",
      "NO_COLOR",
    ]) {
      vi.stubEnv(name, "");
    }
    configureLogger({ verbose: false, quiet: false, noColor: true, json: false, level: "info" });
    process.exitCode = undefined;

    store = new MapObjectStore();
    runtime = {
      globalConfigPath: path.join(tempDir, "global.kubeimportrc"),
      createDependencies: (config: KubeimportConfig): ImportDependencies => {
        toConnection(config);
        return {
          typeRegistry: new SingleTypeRegistry(),
          objectStore: store,
          schemaResolver: new SchemaResolver(parseSchemaDocument(SCHEMAS)),
        };
      },
    };
  });

  afterEach(() => {
    process.chdir(originalCwd);
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  async function runImport(...args: string[]): Promise<{ stdout: string; stderr: string }> {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    try {
      await createProgram(runtime).parseAsync(["node", "kubeimport", "--no-color", "import", ...args]);
      return { stdout: written(stdout), stderr: written(stderr) };
    } finally {
      stdout.mockRestore();
      stderr.mockRestore();
    }
  }

  it("prints the imported state as JSON", async () => {
    store.objects.set("configmaps/default/settings", settings);

    const { stdout } = await runImport("v1#ConfigMap#default#settings", "--server", "https://k8s.test");

    expect(process.exitCode).toBeUndefined();
    const imported: unknown = JSON.parse(stdout);
    expect(imported).toMatchObject({
      typeName: "kubernetes_manifest",
      state: { schemaVersion: 1, value: expectedValue, pending: [] },
    });
  });

  it("writes the state to --output", async () => {
    store.objects.set("configmaps/default/settings", settings);
    const output = path.join(tempDir, "state.json");

    const { stdout, stderr } = await runImport(
      "v1#ConfigMap#default#settings",
      "--server",
      "https://k8s.test",
      "--output",
      output
    );

    expect(stdout).toBe("");
    expect(stderr).toContain(`✓ Imported v1#ConfigMap#default#settings into ${output}\n`);
    const saved: unknown = JSON.parse(fs.readFileSync(output, "utf8"));
    expect(saved).toMatchObject({ state: { value: expectedValue } });
  });

  it("takes the server from the project configuration", async () => {
    store.objects.set("configmaps/default/settings", settings);
    fs.writeFileSync(path.join(tempDir, ".kubeimportrc"), "server: https://k8s.test\n", "utf8");

    const { stdout } = await runImport("v1#ConfigMap#default#settings");

    expect(process.exitCode).toBeUndefined();
    expect(stdout).not.toBe("");
  });

  it("exits 2 on a malformed ID", async () => {
    const { stdout, stderr } = await runImport("v1#ConfigMap", "--server", "https://k8s.test");

    expect(process.exitCode).toBe(2);
    expect(stdout).toBe("");
    expect(stderr).toContain("error: Failed to parse import ID: invalid format for import ID [v1#ConfigMap]\n");
  });

  it("exits 3 without a server", async () => {
    const { stderr } = await runImport("v1#ConfigMap#default#settings");

    expect(process.exitCode).toBe(3);
    expect(stderr).toBe(
      "error: no API server configured\n" +
        "error: Pass --server, set KUBEIMPORT_SERVER, or add server to .kubeimportrc.\n"
    );
  });

  it("exits 3 on an invalid --timeout", async () => {
    const { stderr } = await runImport(
      "v1#ConfigMap#default#settings",
      "--server",
      "https://k8s.test",
      "--timeout",
      "soon"
    );

    expect(process.exitCode).toBe(3);
    expect(stderr).toBe('error: timeoutMs must be a positive integer, got "soon"\n');
  });

  it("exits 5 when the object does not exist", async () => {
    const { stdout, stderr } = await runImport("v1#ConfigMap#default#missing", "--server", "https://k8s.test");

    expect(process.exitCode).toBe(5);
    expect(stdout).toBe("");
    expect(stderr).toContain(
      "error: Failed to get resource v1#ConfigMap#default#missing from API: " +
        'configmaps "missing" not found in namespace "default" (v1, Kind=ConfigMap)\n'
    );
  });

  it("removes its SIGINT listener", async () => {
    const before = process.listenerCount("SIGINT");
    await runImport("v1#ConfigMap#default#missing", "--server", "https://k8s.test");
    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});

describe("exitCodeForFailure", () => {
  it("maps failure kinds to exit codes", () => {
    expect(exitCodeForFailure("parse")).toBe(2);
    expect(exitCodeForFailure("resource-type")).toBe(2);
    expect(exitCodeForFailure("resolution")).toBe(5);
    expect(exitCodeForFailure("fetch")).toBe(5);
    expect(exitCodeForFailure("schema")).toBe(4);
    expect(exitCodeForFailure("conversion")).toBe(4);
    expect(exitCodeForFailure("canceled")).toBe(130);
    expect(exitCodeForFailure("assembly")).toBe(1);
    expect(exitCodeForFailure("unexpected")).toBe(1);
  });

  it("lists the exit codes", () => {
    expect(EXIT_CODES).toEqual({
      SUCCESS: 0,
      GENERAL_ERROR: 1,
      INVALID_ARGUMENT: 2,
      CONFIG_ERROR: 3,
      VALIDATION_ERROR: 4,
      NETWORK_ERROR: 5,
      USER_INTERRUPT: 130,
    });
  });
});
