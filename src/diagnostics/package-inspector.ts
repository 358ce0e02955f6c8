import { InvalidPackageNameError, isAndroidPackageName, ManifestInfo, Outcome, PackageNotFoundError } from '../types.js';
import { CommandTransport, escapeShellArg, runShellCommand } from '../utils/adb.js';
import { parseManifest } from './manifest-parser.js';

function isUnknownPackage(output: string, packageName: string): boolean {
  return output.includes('Unable to find package') || output.includes(`Package [${packageName}] is unknown`);
}

export class PackageInspector {
  constructor(private readonly commands: CommandTransport) {}

  async analyzeManifest(deviceSerial: string, packageName: string): Promise<Outcome<ManifestInfo>> {
    if (!isAndroidPackageName(packageName)) {
      return { success: false, error: new InvalidPackageNameError(packageName) };
    }

    const command = `dumpsys package ${escapeShellArg(packageName)}`;
    const output = await runShellCommand(this.commands, deviceSerial, command);
    if (!output.success) {
      return output;
    }

    if (isUnknownPackage(output.value, packageName)) {
      return { success: false, error: new PackageNotFoundError(packageName, deviceSerial) };
    }

    return { success: true, value: parseManifest(packageName, output.value) };
  }
}
