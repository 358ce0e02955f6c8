import { AppLink, CommandDialect, InvalidPackageNameError, isAndroidPackageName, Outcome } from '../types.js';
import { CommandTransport, queryApiLevel, runShellCommand } from '../utils/adb.js';
import { selectStrategy } from './strategy.js';

export interface AppLinksListing {
  apiLevel: number;
  dialect: CommandDialect;
  appLinks: AppLink[];
}

export interface ReverifyResult {
  command: string;
  output: string;
}

export class AppLinksService {
  constructor(private readonly commands: CommandTransport) {}

  // With a package name the listing only contains that package
  async getAppLinks(
    deviceSerial: string,
    options: { packageName?: string; signal?: AbortSignal } = {}
  ): Promise<Outcome<AppLinksListing>> {
    const { packageName, signal } = options;
    if (packageName !== undefined && !isAndroidPackageName(packageName)) {
      return { success: false, error: new InvalidPackageNameError(packageName) };
    }

    const apiLevel = await queryApiLevel(this.commands, deviceSerial, signal);
    if (!apiLevel.success) {
      return apiLevel;
    }

    const strategy = selectStrategy(apiLevel.value);
    const output = await runShellCommand(
      this.commands,
      deviceSerial,
      strategy.listVerificationCommand(packageName),
      signal
    );
    if (!output.success) {
      return output;
    }

    const appLinks = strategy.parse(output.value);
    return {
      success: true,
      value: {
        apiLevel: apiLevel.value,
        dialect: strategy.dialect,
        appLinks: packageName ? appLinks.filter(link => link.packageName === packageName) : appLinks,
      },
    };
  }

  async forceReverify(deviceSerial: string, packageName: string): Promise<Outcome<ReverifyResult>> {
    if (!isAndroidPackageName(packageName)) {
      return { success: false, error: new InvalidPackageNameError(packageName) };
    }

    const apiLevel = await queryApiLevel(this.commands, deviceSerial);
    if (!apiLevel.success) {
      return apiLevel;
    }

    const command = selectStrategy(apiLevel.value).forceReverifyCommand(packageName);
    const output = await runShellCommand(this.commands, deviceSerial, command);
    if (!output.success) {
      return output;
    }

    return { success: true, value: { command, output: output.value.trim() } };
  }
}
