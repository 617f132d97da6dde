import { describe, it, expect } from "vitest";
import { SshKeyGetter } from "./sshKeyGetter.js";
import { emptyState, type State } from "./state.js";

function buildStateProvider(configure: (state: State) => void) {
  const state = emptyState();
  configure(state);
  return { get: async () => state };
}

describe("ssh key getter", () => {
  it("reads the jumpbox private key", async () => {
    const getter = new SshKeyGetter(
      buildStateProvider(state => {
        state.jumpbox.variables = "jumpbox_ssh:\n  private_key: some-jumpbox-private-key\n";
      }),
    );

    await expect(getter.get("jumpbox")).resolves.toBe("some-jumpbox-private-key");
  });

  it("reads the director private key", async () => {
    const getter = new SshKeyGetter(
      buildStateProvider(state => {
        state.bosh.variables = "jumpbox_ssh:\n  private_key: some-director-private-key\n";
      }),
    );

    await expect(getter.get("director")).resolves.toBe("some-director-private-key");
  });

  it("fails when the key is missing", async () => {
    const getter = new SshKeyGetter(
      buildStateProvider(state => {
        state.jumpbox.variables = "admin_password: some-password\n";
      }),
    );

    await expect(getter.get("jumpbox")).rejects.toThrow(
      "Could not find jumpbox_ssh.private_key in the jumpbox variables",
    );
  });

  it("fails when there are no variables", async () => {
    const getter = new SshKeyGetter(buildStateProvider(() => {}));

    await expect(getter.get("jumpbox")).rejects.toThrow(
      "Could not find jumpbox_ssh.private_key in the jumpbox variables",
    );
  });

  it("fails on invalid yaml", async () => {
    const getter = new SshKeyGetter(
      buildStateProvider(state => {
        state.jumpbox.variables = "jumpbox_ssh: [";
      }),
    );

    await expect(getter.get("jumpbox")).rejects.toThrow("Failed to parse jumpbox variables");
  });
});
