import { AdbCommandError } from '../../src/types';
import { CommandOptions, CommandResult, CommandTransport } from '../../src/utils/adb';
import { FetchOutcome, FetchOptions, NetworkTransport } from '../../src/utils/http';
import { CertificateInspector } from '../../src/diagnostics/certificate-inspector';

// Mock device list output
export const mockDeviceListOutput = `List of devices attached
emulator-5554	device product:sdk_gphone64_x86_64 model:sdk_gphone64_x86_64 transport_id:1
192.168.1.100:5555	unauthorized product:pixel model:Pixel_7 transport_id:2`;

export const mockEmptyDeviceListOutput = 'List of devices attached';

export const fingerprint =
  '14:6D:E9:83:C5:73:06:50:D8:EE:B9:95:2F:34:FC:64:16:A0:83:42:E6:1D:BE:A8:8A:04:96:B2:3F:CF:44:E5';
export const otherFingerprint =
  'AA:BB:CC:DD:EE:FF:00:11:22:33:44:55:66:77:88:99:AA:BB:CC:DD:EE:FF:00:11:22:33:44:55:66:77:88:99';

export function ok(stdout: string): CommandResult {
  return { success: true, stdout, stderr: '', exitCode: 0 };
}

export function exitFailure(stderr: string, exitCode = 1): CommandResult {
  return { success: false, stdout: '', stderr, exitCode, reason: 'exit', message: stderr };
}

export interface RecordedCommand {
  args: string[];
  deviceId?: string;
}

// Answers adb invocations from a table keyed by the space-joined arguments
export class FakeCommandTransport implements CommandTransport {
  readonly calls: RecordedCommand[] = [];
  private readonly results = new Map<string, CommandResult>();
  private readonly streams = new Map<string, string[]>();

  respond(args: string[], result: CommandResult | string): this {
    this.results.set(args.join(' '), typeof result === 'string' ? ok(result) : result);
    return this;
  }

  shell(command: string, result: CommandResult | string): this {
    return this.respond(['shell', command], result);
  }

  stream(args: string[], lines: string[]): this {
    this.streams.set(args.join(' '), lines);
    return this;
  }

  commands(): string[] {
    return this.calls.map(call => call.args.join(' '));
  }

  async runCommand(args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.calls.push({ args, deviceId: options.deviceId });
    if (options.signal?.aborted) {
      return { success: false, stdout: '', stderr: '', exitCode: null, reason: 'cancelled', message: 'Command cancelled' };
    }
    return this.results.get(args.join(' ')) ?? exitFailure(`unexpected command: ${args.join(' ')}`);
  }

  async *runCommandStreaming(args: string[], options: CommandOptions = {}): AsyncGenerator<string> {
    this.calls.push({ args, deviceId: options.deviceId });
    const lines = this.streams.get(args.join(' '));
    if (!lines) {
      throw new AdbCommandError(args.join(' '), 'unexpected command');
    }
    for (const line of lines) {
      yield line;
    }
  }
}

export function jsonResponse(body: unknown, contentType = 'application/json'): FetchOutcome {
  return {
    kind: 'response',
    response: {
      status: 200,
      headers: { 'content-type': contentType },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    },
  };
}

export function statusResponse(status: number, headers: Record<string, string> = {}): FetchOutcome {
  return { kind: 'response', response: { status, headers, body: '' } };
}

// Serves canned outcomes per URL; unknown URLs fail DNS resolution
export class FakeNetworkTransport implements NetworkTransport {
  readonly requests: string[] = [];
  private readonly outcomes = new Map<string, FetchOutcome>();
  private readonly pending = new Set<string>();

  serve(url: string, outcome: FetchOutcome): this {
    this.outcomes.set(url, outcome);
    return this;
  }

  // Never answers until the request is aborted
  hang(url: string): this {
    this.pending.add(url);
    return this;
  }

  fetch(url: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    this.requests.push(url);

    if (this.pending.has(url)) {
      return new Promise(resolve => {
        options.signal?.addEventListener('abort', () =>
          resolve({ kind: 'failure', reason: 'cancelled', message: 'Request cancelled' })
        );
      });
    }

    return Promise.resolve(
      this.outcomes.get(url) ?? { kind: 'failure', reason: 'dns', message: `getaddrinfo ENOTFOUND ${url}` }
    );
  }
}

export class FakeCertificateInspector implements CertificateInspector {
  readonly calls: Array<{ deviceSerial: string; packageName: string }> = [];

  constructor(private readonly value: string | null | Error) {}

  async getLocalFingerprint(deviceSerial: string, packageName: string): Promise<string | null> {
    this.calls.push({ deviceSerial, packageName });
    if (this.value instanceof Error) {
      throw this.value;
    }
    return this.value;
  }
}

export function assetLinksDocument(packageName: string, fingerprints: string[]): unknown[] {
  return [
    {
      relation: ['delegate_permission/common.handle_all_urls'],
      target: {
        namespace: 'android_app',
        package_name: packageName,
        sha256_cert_fingerprints: fingerprints,
      },
    },
  ];
}
