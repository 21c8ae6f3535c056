import { describe, it, expect, vi } from "vitest";
import {
  createAzureCliSessionProvider,
  type CommandResult,
  type CommandRunner,
} from "./azure-cli.js";

function ok(stdout = ""): CommandResult {
  return { exitCode: 0, stdout, stderr: "" };
}

function makeRunner(result: CommandResult) {
  return vi.fn<CommandRunner>().mockResolvedValue(result);
}

const ACCOUNT_SHOW = JSON.stringify({
  id: "aaaaaaaa-aaaa-aaaa-aaaa-aaaaaaaaaaaa",
  tenantId: "11111111-1111-1111-1111-111111111111",
  name: "Storage Ops",
  user: { name: "operator@example.com", type: "user" },
});

describe("Azure CLI session provider", () => {
  it("reads the active session from az account show", async () => {
    const run = makeRunner(ok(ACCOUNT_SHOW));
    const provider = createAzureCliSessionProvider({ run });

    await expect(provider.getCurrentSession()).resolves.toEqual({
      tenantId: "11111111-1111-1111-1111-111111111111",
      subscriptionId: "aaaaaaaa-aaaa-aaaa-aaaa-aaaaaaaaaaaa",
      user: "operator@example.com",
    });
    expect(run).toHaveBeenCalledWith("az", ["account", "show", "--output", "json"]);
  });

  it("treats a non-zero exit as no session", async () => {
    const run = makeRunner({
      exitCode: 1,
      stdout: "",
      stderr: "Please run 'az login' to setup account.",
    });
    const provider = createAzureCliSessionProvider({ run });

    await expect(provider.getCurrentSession()).resolves.toBeNull();
  });

  it("rejects output missing the tenant id", async () => {
    const run = makeRunner(ok(JSON.stringify({ id: "sub" })));
    const provider = createAzureCliSessionProvider({ run });

    await expect(provider.getCurrentSession()).rejects.toThrow(
      'Unexpected "az account show" output',
    );
  });

  it("runs an interactive tenant-scoped login", async () => {
    const run = makeRunner(ok());
    const provider = createAzureCliSessionProvider({ run, command: "/opt/az/bin/az" });

    await provider.login("11111111-1111-1111-1111-111111111111");

    expect(run).toHaveBeenCalledWith(
      "/opt/az/bin/az",
      ["login", "--tenant", "11111111-1111-1111-1111-111111111111", "--output", "none"],
      { interactive: true },
    );
  });

  it("reports stderr when login fails", async () => {
    const run = makeRunner({ exitCode: 1, stdout: "", stderr: "User cancelled the flow\n" });
    const provider = createAzureCliSessionProvider({ run });

    await expect(provider.login("t")).rejects.toThrow(
      "az login failed: User cancelled the flow",
    );
  });

  it("switches subscription and reports the exit code when stderr is empty", async () => {
    const run = makeRunner({ exitCode: 2, stdout: "", stderr: "" });
    const provider = createAzureCliSessionProvider({ run });

    await expect(provider.setActiveScope("sub-1")).rejects.toThrow(
      "az account set failed: exit code 2",
    );
    expect(run).toHaveBeenCalledWith("az", [
      "account",
      "set",
      "--subscription",
      "sub-1",
    ]);
  });
});
