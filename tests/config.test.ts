import { mkdtempSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { loadPluginConfig, parseBool, type Env } from "../src/config/env.js";
import { loadSettingsFile, parseSettings } from "../src/config/settingsFile.js";
import { PluginError } from "../src/errors.js";
import { SHA } from "./helpers/fakes.js";

function droneEnv(overrides: Env = {}): Env {
  return {
    DRONE_PULL_REQUEST: "123",
    DRONE_BUILD_NUMBER: "42",
    DRONE_COMMIT_SHA: SHA,
    DRONE_REPO_NAME: "hello-world",
    DRONE_REPO_OWNER: "octocat",
    DRONE_SYSTEM_PROTO: "https",
    DRONE_SYSTEM_HOSTNAME: "drone.example.com",
    DRONE_TOKEN: "test-drone-token",
    GITHUB_TOKEN: "test-github-token",
    PLUGIN_STAGE: "build-pull-request",
    PLUGIN_STEP: "lint-code",
    ...overrides,
  };
}

function configError(fn: () => unknown): PluginError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PluginError) return err;
    throw err;
  }
  throw new Error("expected a PluginError");
}

describe("loadPluginConfig", () => {
  it("builds the configuration from a complete environment", () => {
    expect(loadPluginConfig(droneEnv())).toEqual({
      kind: "READY",
      config: {
        droneServer: "https://drone.example.com",
        repoOwner: "octocat",
        repoName: "hello-world",
        buildNumber: 42,
        pullRequest: 123,
        commitSha: SHA,
        stage: "build-pull-request",
        step: "lint-code",
        keep: false,
        verbatim: false,
        when: "always",
        order: "delete-then-create",
      },
      credentials: {
        droneServer: "https://drone.example.com",
        droneToken: "test-drone-token",
        githubToken: "test-github-token",
      },
    });
  });

  it("stops before validating anything else when there is no pull request", () => {
    expect(loadPluginConfig({ DRONE_PULL_REQUEST: "  " })).toEqual({ kind: "NO_PULL_REQUEST" });
    expect(loadPluginConfig({})).toEqual({ kind: "NO_PULL_REQUEST" });
  });

  it("reports the first missing value in a fixed order", () => {
    const err = configError(() =>
      loadPluginConfig(droneEnv({ GITHUB_TOKEN: undefined, DRONE_REPO_NAME: "", PLUGIN_STEP: undefined })),
    );
    expect(err.kind).toBe("CONFIG");
    expect(err.message).toBe("DRONE_REPO_NAME was not provided");
  });

  it("requires stage and step", () => {
    expect(configError(() => loadPluginConfig(droneEnv({ PLUGIN_STAGE: " " }))).message).toBe(
      "PLUGIN_STAGE was not provided",
    );
    expect(configError(() => loadPluginConfig(droneEnv({ PLUGIN_STEP: undefined }))).message).toBe(
      "PLUGIN_STEP was not provided",
    );
  });

  it("rejects numbers that are not positive integers", () => {
    expect(configError(() => loadPluginConfig(droneEnv({ DRONE_BUILD_NUMBER: "4x" }))).message).toBe(
      "DRONE_BUILD_NUMBER is not a valid number: 4x",
    );
    expect(configError(() => loadPluginConfig(droneEnv({ DRONE_PULL_REQUEST: "0" }))).message).toBe(
      "DRONE_PULL_REQUEST is not a valid number: 0",
    );
    expect(configError(() => loadPluginConfig(droneEnv({ DRONE_PULL_REQUEST: "-3" }))).message).toBe(
      "DRONE_PULL_REQUEST is not a valid number: -3",
    );
  });

  it("rejects a commit sha shorter than the abbreviated form", () => {
    expect(configError(() => loadPluginConfig(droneEnv({ DRONE_COMMIT_SHA: "abc123" }))).message).toBe(
      "DRONE_COMMIT_SHA must be at least 7 characters: abc123",
    );
  });

  it("parses boolean settings", () => {
    const loaded = loadPluginConfig(droneEnv({ PLUGIN_KEEP: "true", PLUGIN_VERBATIM: "1" }));
    expect(loaded.kind === "READY" && loaded.config.keep).toBe(true);
    expect(loaded.kind === "READY" && loaded.config.verbatim).toBe(true);
  });

  it("rejects an unknown comment policy or order", () => {
    expect(configError(() => loadPluginConfig(droneEnv({ PLUGIN_WHEN: "sometimes" }))).message).toBe(
      "PLUGIN_WHEN must be one of success, failure, always: sometimes",
    );
    expect(configError(() => loadPluginConfig(droneEnv({ PLUGIN_ORDER: "random" }))).message).toBe(
      "PLUGIN_ORDER must be one of delete-then-create, create-then-delete: random",
    );
  });

  it("falls back to file settings and lets the environment override them", () => {
    const file = {
      stage: "from-file",
      step: "file-step",
      keep: true,
      verbatim: true,
      when: "failure" as const,
      order: "create-then-delete" as const,
    };
    const loaded = loadPluginConfig(
      droneEnv({ PLUGIN_STAGE: undefined, PLUGIN_KEEP: "false", PLUGIN_WHEN: "success" }),
      file,
    );
    if (loaded.kind !== "READY") throw new Error("expected READY");
    expect(loaded.config).toMatchObject({
      stage: "from-file",
      step: "lint-code",
      keep: false,
      verbatim: true,
      when: "success",
      order: "create-then-delete",
    });
  });
});

describe("parseBool", () => {
  it("accepts the usual spellings of true and nothing else", () => {
    for (const v of ["1", "t", "T", "TRUE", "true", "True"]) expect(parseBool(v)).toBe(true);
    for (const v of ["", "0", "false", "yes", "on", "tRuE"]) expect(parseBool(v)).toBe(false);
  });
});

describe("parseSettings", () => {
  const path = ".drone-comment.yml";

  it("reads every supported key", () => {
    const content = [
      "stage: build-pull-request",
      "step: ' lint-code '",
      "keep: true",
      "verbatim: false",
      "when: failure",
      "order: create-then-delete",
    ].join("\n");
    expect(parseSettings(content, path)).toEqual({
      stage: "build-pull-request",
      step: "lint-code",
      keep: true,
      verbatim: false,
      when: "failure",
      order: "create-then-delete",
    });
  });

  it("reads booleans the way the environment does, defaulting to false", () => {
    expect(parseSettings('keep: "true"\nverbatim: "1"\n', path)).toEqual({ keep: true, verbatim: true });
    expect(parseSettings("keep: yes\nverbatim: 1\n", path)).toEqual({ keep: false, verbatim: false });
    expect(parseSettings("keep: [true]\n", path)).toEqual({ keep: false });
  });

  it("treats an empty document as no settings", () => {
    expect(parseSettings("", path)).toEqual({});
    expect(parseSettings("# nothing here\n", path)).toEqual({});
  });

  it("rejects content that is not a mapping", () => {
    expect(configError(() => parseSettings("- a\n- b\n", path)).message).toBe(
      ".drone-comment.yml: root must be a mapping",
    );
  });

  it("rejects unknown keys", () => {
    expect(configError(() => parseSettings("stages: x\n", path)).message).toBe(
      '.drone-comment.yml: unknown key "stages"',
    );
  });

  it("rejects values of the wrong type", () => {
    expect(configError(() => parseSettings("step: ''\n", path)).message).toBe(
      ".drone-comment.yml: step must be a non-empty string",
    );
    expect(configError(() => parseSettings("when: never\n", path)).message).toBe(
      ".drone-comment.yml: when must be one of success, failure, always",
    );
    expect(configError(() => parseSettings("order: 3\n", path)).message).toBe(
      ".drone-comment.yml: order must be one of delete-then-create, create-then-delete",
    );
  });

  it("reports invalid YAML as a configuration error", () => {
    const err = configError(() => parseSettings("keep: true\nkeep: false\n", path));
    expect(err.kind).toBe("CONFIG");
    expect(err.message.startsWith(".drone-comment.yml: invalid YAML: ")).toBe(true);
  });
});

describe("loadSettingsFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "drone-step-comment-config-"));
  });

  it("returns no settings when the default file is absent", () => {
    expect(loadSettingsFile(dir)).toEqual({});
  });

  it("reads the default file from the working directory", () => {
    writeFileSync(join(dir, ".drone-comment.yml"), "stage: build\nkeep: true\n", "utf8");
    expect(loadSettingsFile(dir)).toEqual({ stage: "build", keep: true });
  });

  it("reads an explicit path relative to the working directory", () => {
    writeFileSync(join(dir, "comment.yml"), "when: success\n", "utf8");
    expect(loadSettingsFile(dir, "comment.yml")).toEqual({ when: "success" });
  });

  it("fails when an explicit path does not exist", () => {
    const err = configError(() => loadSettingsFile(dir, "missing.yml"));
    expect(err.kind).toBe("CONFIG");
    expect(err.message).toBe("missing.yml: settings file not found");
  });
});
