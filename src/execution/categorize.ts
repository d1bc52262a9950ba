// Turns a failed command's stderr into an operator hint.
// Patterns are matched against lowercased stderr; first match wins.

export interface FailureCategory {
  readonly code: string;
  readonly transient: boolean;
  readonly remediation: string[];
}

interface FailurePattern extends FailureCategory {
  test: (stderr: string) => boolean;
}

const FAILURE_PATTERNS: FailurePattern[] = [
  { test: (s) => s.includes("permission denied") || s.includes("sudo:") || s.includes("operation not permitted") || s.includes("are you root"),
    code: "PERMISSION_DENIED", transient: false,
    remediation: ["Run the provisioner with sudo", "Run 'sudo -n true' to test sudo access"] },
  { test: (s) => s.includes("unable to locate package") || s.includes("no match for argument") || s.includes("has no installation candidate"),
    code: "PACKAGE_NOT_FOUND", transient: false,
    remediation: ["Check the package name in the packages list of config.yaml", "Install the package manually, then re-run"] },
  { test: (s) => s.includes("could not get lock") || s.includes("dpkg frontend lock") || s.includes("rpm.lock") || s.includes("waiting for process with pid"),
    code: "RESOURCE_LOCKED", transient: true,
    remediation: ["Another package manager process may be running", "Wait for it to complete, then re-run"] },
  { test: (s) => s.includes("could not resolve") || s.includes("failed to fetch") || s.includes("connection timed out") || s.includes("network is unreachable"),
    code: "NETWORK_ERROR", transient: true,
    remediation: ["Check network connectivity and DNS", "Re-run once the network is back; completed steps are skipped"] },
  { test: (s) => s.includes("repository not found") || s.includes("authentication failed") || s.includes("does not appear to be a git repository"),
    code: "REPOSITORY_UNAVAILABLE", transient: false,
    remediation: ["Check repository.url in config.yaml", "Verify the owner can reach the remote with 'git ls-remote'"] },
  { test: (s) => s.includes("not possible to fast-forward") || s.includes("would be overwritten by merge") || s.includes("divergent branches"),
    code: "CHECKOUT_DIVERGED", transient: false,
    remediation: ["Inspect local changes with 'git status' in the project directory", "Commit, stash or discard them, then re-run"] },
  { test: (s) => s.includes("no space left on device") || s.includes("cannot allocate memory"),
    code: "RESOURCE_EXHAUSTED", transient: false,
    remediation: ["Free disk space or memory on the device, then re-run"] },
];

export function categorizeFailure(stderr: string): FailureCategory {
  const lowered = stderr.toLowerCase();
  for (const { test, ...category } of FAILURE_PATTERNS) {
    if (test(lowered)) return category;
  }
  return { code: "COMMAND_FAILED", transient: false, remediation: ["Review the command output above for the specific error"] };
}
