import { CommandTransport, queryApiLevel, runShellCommand } from '../utils/adb.js';
import { extractSignatureFingerprint } from './app-links-parser.js';
import { APP_LINKS_MIN_API_LEVEL, appLinksStrategy } from './strategy.js';

export interface CertificateInspector {
  getLocalFingerprint(deviceSerial: string, packageName: string, signal?: AbortSignal): Promise<string | null>;
}

// Reads the signing certificate the device reports for an installed package
export class DeviceCertificateInspector implements CertificateInspector {
  constructor(private readonly commands: CommandTransport) {}

  async getLocalFingerprint(
    deviceSerial: string,
    packageName: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    const apiLevel = await queryApiLevel(this.commands, deviceSerial, signal);
    if (!apiLevel.success || apiLevel.value < APP_LINKS_MIN_API_LEVEL) {
      return null;
    }

    const output = await runShellCommand(
      this.commands,
      deviceSerial,
      appLinksStrategy.listVerificationCommand(packageName),
      signal
    );

    return output.success ? extractSignatureFingerprint(output.value, packageName) : null;
  }
}
