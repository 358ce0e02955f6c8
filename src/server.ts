import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema, Tool } from '@modelcontextprotocol/sdk/types.js';
import pkg from '../package.json';
import { AppConfig, DEFAULT_CONFIG, loadConfig } from './config.js';
import { AppLinksService } from './diagnostics/app-links-service.js';
import { AssetLinksValidator } from './diagnostics/asset-links-validator.js';
import { CertificateInspector, DeviceCertificateInspector } from './diagnostics/certificate-inspector.js';
import { DeepLinkLogReader } from './diagnostics/deep-link-log.js';
import { DiagnosticsService } from './diagnostics/diagnostics-service.js';
import { DEFAULT_DEEP_LINK_TAGS } from './diagnostics/logcat-parser.js';
import { summarizeManifest } from './diagnostics/manifest-summary.js';
import { PackageInspector } from './diagnostics/package-inspector.js';
import {
  AnalyzeManifestInput,
  AnalyzeManifestInputSchema,
  AnalyzeManifestOutput,
  AnalyzeManifestOutputSchema,
  AnalyzeManifestToolSchema,
  DiagnoseAppLinksInput,
  DiagnoseAppLinksInputSchema,
  DiagnoseAppLinksOutput,
  DiagnoseAppLinksOutputSchema,
  DiagnoseAppLinksToolSchema,
  ForceReverifyInput,
  ForceReverifyInputSchema,
  ForceReverifyOutput,
  ForceReverifyOutputSchema,
  ForceReverifyToolSchema,
  GetAppLinksInput,
  GetAppLinksInputSchema,
  GetAppLinksOutput,
  GetAppLinksOutputSchema,
  GetAppLinksToolSchema,
  GetDeepLinkLogInput,
  GetDeepLinkLogInputSchema,
  GetDeepLinkLogOutput,
  GetDeepLinkLogOutputSchema,
  GetDeepLinkLogToolSchema,
  ListDevicesInputSchema,
  ListDevicesOutput,
  ListDevicesOutputSchema,
  ListDevicesToolSchema,
  ValidateAssetLinksInput,
  ValidateAssetLinksInputSchema,
  ValidateAssetLinksOutput,
  ValidateAssetLinksOutputSchema,
  ValidateAssetLinksToolSchema,
} from './types.js';
import { AdbClient, CommandTransport, DeviceService } from './utils/adb.js';
import {
  formatErrorForResponse,
  getUserFriendlyErrorMessage,
  isRecoverableError,
  unwrapOutcome,
} from './utils/error.js';
import { HttpClient, NetworkTransport } from './utils/http.js';
import { createLogger, Logger } from './utils/logger.js';

export interface AppLinksMcpServerOptions {
  config?: AppConfig;
  commands?: CommandTransport;
  network?: NetworkTransport;
  certificates?: CertificateInspector;
  logger?: Logger;
}

class AppLinksMcpServer {
  private server: Server;
  private logger: Logger;
  private devices: DeviceService;
  private appLinks: AppLinksService;
  private validator: AssetLinksValidator;
  private diagnostics: DiagnosticsService;
  private packages: PackageInspector;
  private deepLinkLog: DeepLinkLogReader;

  constructor(options: AppLinksMcpServerOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;
    const commands =
      options.commands ?? new AdbClient({ adbPath: config.adbPath, timeoutMs: config.commandTimeoutMs });
    const network =
      options.network ??
      new HttpClient({
        timeoutMs: config.fetchTimeoutMs,
        maxBodyBytes: config.maxManifestBytes,
        userAgent: config.userAgent,
      });

    this.logger = options.logger ?? createLogger('server', config.logLevel);
    this.devices = new DeviceService(commands);
    this.appLinks = new AppLinksService(commands);
    this.validator = new AssetLinksValidator(network, this.logger);
    this.diagnostics = new DiagnosticsService({
      commands,
      validator: this.validator,
      certificates: options.certificates ?? new DeviceCertificateInspector(commands),
      logger: this.logger,
    });
    this.packages = new PackageInspector(commands);
    this.deepLinkLog = new DeepLinkLogReader(commands);

    this.server = new Server(
      {
        name: 'applinks-diagnostics-mcp',
        version: pkg.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools: Tool[] = [
        {
          name: 'list_android_devices',
          description: 'List all connected Android devices and emulators with their API level',
          inputSchema: ListDevicesToolSchema,
        },
        {
          name: 'get_android_app_links',
          description: 'Read the App Links domain verification state reported by the device',
          inputSchema: GetAppLinksToolSchema,
        },
        {
          name: 'force_android_app_links_reverify',
          description: 'Ask the device to verify the App Links domains of a package again',
          inputSchema: ForceReverifyToolSchema,
        },
        {
          name: 'validate_asset_links',
          description: "Fetch and validate a domain's /.well-known/assetlinks.json",
          inputSchema: ValidateAssetLinksToolSchema,
        },
        {
          name: 'diagnose_android_app_links',
          description:
            'Diagnose why App Links verification fails for a package: device state, assetlinks.json and certificate fingerprint per domain',
          inputSchema: DiagnoseAppLinksToolSchema,
        },
        {
          name: 'analyze_android_manifest',
          description: 'List the activities, intent filters and deep links an installed package declares',
          inputSchema: AnalyzeManifestToolSchema,
        },
        {
          name: 'get_android_deep_link_log',
          description: 'Read recent device log lines and classify deep link events',
          inputSchema: GetDeepLinkLogToolSchema,
        },
      ];

      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { signal } = extra;
      const { name, arguments: args } = request.params;

      try {
        switch (name) {
          case 'list_android_devices': {
            ListDevicesInputSchema.parse(args ?? {});
            const result = await this.listDevices();
            return {
              content: [
                {
                  type: 'text',
                  text: JSON.stringify(result),
                },
              ],
            };
          }

          case 'get_android_app_links': {
            const input = GetAppLinksInputSchema.parse(args ?? {});
            const result = await this.getAppLinks(input, signal);
            return {
              content: [
                {
                  type: 'text',
                  text: JSON.stringify(result),
                },
              ],
            };
          }

          case 'force_android_app_links_reverify': {
            const input = ForceReverifyInputSchema.parse(args ?? {});
            const result = await this.forceReverify(input);
            return {
              content: [
                {
                  type: 'text',
                  text: JSON.stringify(result),
                },
              ],
            };
          }

          case 'validate_asset_links': {
            const input = ValidateAssetLinksInputSchema.parse(args ?? {});
            const result = await this.validateAssetLinks(input, signal);
            return {
              content: [
                {
                  type: 'text',
                  text: JSON.stringify(result),
                },
              ],
            };
          }

          case 'diagnose_android_app_links': {
            const input = DiagnoseAppLinksInputSchema.parse(args ?? {});
            const result = await this.diagnoseAppLinks(input, signal);
            return {
              content: [
                {
                  type: 'text',
                  text: JSON.stringify(result),
                },
              ],
            };
          }

          case 'analyze_android_manifest': {
            const input = AnalyzeManifestInputSchema.parse(args ?? {});
            const result = await this.analyzeManifest(input);
            return {
              content: [
                {
                  type: 'text',
                  text: JSON.stringify(result),
                },
              ],
            };
          }

          case 'get_android_deep_link_log': {
            const input = GetDeepLinkLogInputSchema.parse(args ?? {});
            const result = await this.getDeepLinkLog(input, signal);
            return {
              content: [
                {
                  type: 'text',
                  text: JSON.stringify(result),
                },
              ],
            };
          }

          default:
            throw new Error(`Unknown tool: ${name}`);
        }
      } catch (error) {
        const meta = { tool: name, error: getUserFriendlyErrorMessage(error) };
        if (isRecoverableError(error)) {
          this.logger.warn('Tool call failed', meta);
        } else {
          this.logger.error('Tool call failed', meta);
        }
        return {
          content: [
            {
              type: 'text',
              text: formatErrorForResponse(error),
            },
          ],
          isError: true,
        };
      }
    });
  }

  private async resolveDeviceSerial(deviceId?: string): Promise<string> {
    return unwrapOutcome(await this.devices.resolveDevice(deviceId)).serial;
  }

  private async listDevices(): Promise<ListDevicesOutput> {
    const devices = unwrapOutcome(await this.devices.getConnectedDevices());
    return ListDevicesOutputSchema.parse({ devices });
  }

  private async getAppLinks(input: GetAppLinksInput, signal?: AbortSignal): Promise<GetAppLinksOutput> {
    const deviceId = await this.resolveDeviceSerial(input.deviceId);
    const listing = unwrapOutcome(
      await this.appLinks.getAppLinks(deviceId, { packageName: input.packageName, signal })
    );
    return GetAppLinksOutputSchema.parse({ deviceId, ...listing });
  }

  private async forceReverify(input: ForceReverifyInput): Promise<ForceReverifyOutput> {
    const deviceId = await this.resolveDeviceSerial(input.deviceId);
    const result = unwrapOutcome(await this.appLinks.forceReverify(deviceId, input.packageName));
    return ForceReverifyOutputSchema.parse({ deviceId, packageName: input.packageName, ...result });
  }

  private async validateAssetLinks(
    input: ValidateAssetLinksInput,
    signal?: AbortSignal
  ): Promise<ValidateAssetLinksOutput> {
    const validation = await this.validator.validate(input.domain, {
      signal,
      packageName: input.packageName,
      expectedFingerprint: input.fingerprint,
    });
    return ValidateAssetLinksOutputSchema.parse(validation);
  }

  private async diagnoseAppLinks(
    input: DiagnoseAppLinksInput,
    signal?: AbortSignal
  ): Promise<DiagnoseAppLinksOutput> {
    const deviceId = await this.resolveDeviceSerial(input.deviceId);
    const diagnostics = unwrapOutcome(await this.diagnostics.diagnose(deviceId, input.packageName, { signal }));
    return DiagnoseAppLinksOutputSchema.parse(diagnostics);
  }

  private async analyzeManifest(input: AnalyzeManifestInput): Promise<AnalyzeManifestOutput> {
    const deviceId = await this.resolveDeviceSerial(input.deviceId);
    const manifest = unwrapOutcome(await this.packages.analyzeManifest(deviceId, input.packageName));
    return AnalyzeManifestOutputSchema.parse({ deviceId, manifest, summary: summarizeManifest(manifest) });
  }

  private async getDeepLinkLog(input: GetDeepLinkLogInput, signal?: AbortSignal): Promise<GetDeepLinkLogOutput> {
    const deviceId = await this.resolveDeviceSerial(input.deviceId);
    const snapshot = unwrapOutcome(
      await this.deepLinkLog.read(
        deviceId,
        {
          tags: input.tags ?? [...DEFAULT_DEEP_LINK_TAGS],
          keywords: input.keywords,
          minLevel: input.minLevel,
        },
        { lines: input.lines, onlyDeepLinkEvents: input.onlyDeepLinkEvents, signal }
      )
    );
    return GetDeepLinkLogOutputSchema.parse({ deviceId, ...snapshot });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  async run(): Promise<void> {
    await this.connect(new StdioServerTransport());
    this.logger.info('App Links diagnostics MCP server started', { version: pkg.version });
  }
}

// Export the server class
export { AppLinksMcpServer };

// Main entry point
async function main() {
  const config = loadConfig();
  const server = new AppLinksMcpServer({ config });
  await server.run();
}

// Run the server if this file is executed directly
if (require.main === module) {
  main().catch(error => {
    console.error('Server error:', formatErrorForResponse(error));
    process.exit(1);
  });
}
