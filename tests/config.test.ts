import { resolve } from "node:path";

import { describe, expect, it } from "vitest";

import { resolveComposeConfig, splitOptions } from "../src/config.js";

describe("splitOptions", () => {
  it("splits on runs of whitespace and drops empty tokens", () => {
    expect(splitOptions("  --pull \t --no-cache\n")).toEqual(["--pull", "--no-cache"]);
  });

  it("returns no arguments for an empty string", () => {
    expect(splitOptions("")).toEqual([]);
  });
});

describe("resolveComposeConfig", () => {
  it("applies documented defaults", () => {
    const config = resolveComposeConfig({}, "/work");

    expect(config).toEqual({
      serviceName: "privateerr",
      downTimeout: "30",
      downOptions: ["--timeout", "30", "--rmi", "all", "--volumes"],
      buildOptions: ["--pull", "--no-cache"],
      upOptions: ["--build", "--force-recreate", "--pull", "always"],
      logsOptions: ["--follow"],
      dependencies: ["docker", "docker-compose"],
      dockerfile: resolve("/work", "docker/Dockerfile"),
    });
  });

  it("interpolates COMPOSE_DOWN_TIMEOUT into the default teardown options", () => {
    const config = resolveComposeConfig({ COMPOSE_DOWN_TIMEOUT: "5" }, "/work");

    expect(config.downTimeout).toBe("5");
    expect(config.downOptions).toEqual(["--timeout", "5", "--rmi", "all", "--volumes"]);
  });

  it("uses COMPOSE_DOWN_OPTIONS verbatim when set", () => {
    const config = resolveComposeConfig(
      { COMPOSE_DOWN_TIMEOUT: "5", COMPOSE_DOWN_OPTIONS: "--volumes" },
      "/work"
    );

    expect(config.downOptions).toEqual(["--volumes"]);
  });

  it("overrides each option set independently", () => {
    const config = resolveComposeConfig(
      {
        COMPOSE_SERVICE_NAME: "vpn",
        COMPOSE_BUILD_OPTIONS: "--quiet",
        COMPOSE_UP_OPTIONS: "--detach",
        COMPOSE_LOGS_OPTIONS: "--tail 50",
      },
      "/work"
    );

    expect(config.serviceName).toBe("vpn");
    expect(config.buildOptions).toEqual(["--quiet"]);
    expect(config.upOptions).toEqual(["--detach"]);
    expect(config.logsOptions).toEqual(["--tail", "50"]);
    expect(config.downOptions).toEqual(["--timeout", "30", "--rmi", "all", "--volumes"]);
  });

  it("treats a variable set to the empty string as an empty override", () => {
    const config = resolveComposeConfig({ COMPOSE_UP_OPTIONS: "" }, "/work");

    expect(config.upOptions).toEqual([]);
  });

  it("passes the teardown timeout through as text", () => {
    const config = resolveComposeConfig({ COMPOSE_DOWN_TIMEOUT: "1m" }, "/work");

    expect(config.downTimeout).toBe("1m");
    expect(config.downOptions).toEqual(["--timeout", "1m", "--rmi", "all", "--volumes"]);
  });

  it("ignores the teardown timeout when COMPOSE_DOWN_OPTIONS is set", () => {
    const config = resolveComposeConfig({ COMPOSE_DOWN_TIMEOUT: "", COMPOSE_DOWN_OPTIONS: "--volumes" }, "/work");

    expect(config.downOptions).toEqual(["--volumes"]);
  });
});
