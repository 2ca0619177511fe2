import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface RuntimeDependency {
  command: string;
  args: string[];
  required: boolean;
  label: string;
}

export interface RuntimeDependencyReport {
  missingRequired: string[];
  missingOptional: string[];
}

export const DEPENDENCIES: readonly RuntimeDependency[] = [
  {
    command: "ffmpeg",
    args: ["-version"],
    required: true,
    label: "ffmpeg (decoding)"
  },
  {
    command: "aplay",
    args: ["--version"],
    required: false,
    label: "aplay (audio output)"
  }
];

async function isCommandAvailable(command: string, args: string[]): Promise<boolean> {
  try {
    await execFileAsync(command, args, { timeout: 3_000 });
    return true;
  } catch (error) {
    // Only a missing binary counts; a non-zero exit still means it is installed.
    return !(error instanceof Error && "code" in error && error.code === "ENOENT");
  }
}

export async function checkRuntimeDependencies(
  dependencies: readonly RuntimeDependency[] = DEPENDENCIES
): Promise<RuntimeDependencyReport> {
  const report: RuntimeDependencyReport = {
    missingRequired: [],
    missingOptional: []
  };

  for (const dependency of dependencies) {
    const available = await isCommandAvailable(dependency.command, dependency.args);
    if (available) {
      continue;
    }

    if (dependency.required) {
      report.missingRequired.push(dependency.label);
    } else {
      report.missingOptional.push(dependency.label);
    }
  }

  return report;
}
