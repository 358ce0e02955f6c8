import fs from 'fs';
import path from 'path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { AppLinksMcpServer } from '../../src/server';
import { silentLogger } from '../../src/utils/logger';
import {
  assetLinksDocument,
  FakeCertificateInspector,
  FakeCommandTransport,
  FakeNetworkTransport,
  fingerprint,
  jsonResponse,
  mockDeviceListOutput,
  mockEmptyDeviceListOutput,
} from '../mocks/adb.mock';

const SERIAL = 'emulator-5554';
const PACKAGE = 'com.example.shop';
const ASSET_LINKS_URL = 'https://shop.example.com/.well-known/assetlinks.json';

const getAppLinksOutput = `  ${PACKAGE}:
    ID: 6a1f0c52-3d0e-4b8e-9f6b-2a9c1d7e5b34
    Signatures: [${fingerprint}]
    Domain verification state:
      shop.example.com: verified
`;

describe('App Links MCP Server Integration', () => {
  let commands: FakeCommandTransport;
  let network: FakeNetworkTransport;
  let server: AppLinksMcpServer;
  let client: Client;

  beforeEach(async () => {
    commands = new FakeCommandTransport()
      .respond(['devices', '-l'], mockDeviceListOutput)
      .shell('getprop ro.build.version.release', '14\n')
      .shell('getprop ro.build.version.sdk', '34\n');
    network = new FakeNetworkTransport();

    server = new AppLinksMcpServer({
      commands,
      network,
      certificates: new FakeCertificateInspector(fingerprint),
      logger: silentLogger,
    });
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  async function callTool(name: string, args: Record<string, unknown> = {}) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const [first] = result.content;
    if (first?.type !== 'text') {
      throw new Error(`Tool ${name} did not return text content`);
    }
    return { text: first.text, isError: result.isError === true };
  }

  async function callToolJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const { text, isError } = await callTool(name, args);
    expect(isError).toBe(false);
    return JSON.parse(text);
  }

  it('should list every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(tool => tool.name)).toEqual([
      'list_android_devices',
      'get_android_app_links',
      'force_android_app_links_reverify',
      'validate_asset_links',
      'diagnose_android_app_links',
      'analyze_android_manifest',
      'get_android_deep_link_log',
    ]);
    expect(tools[4].inputSchema.required).toEqual(['packageName']);
  });

  it('should list connected devices', async () => {
    expect(await callToolJson('list_android_devices')).toEqual({
      devices: [
        {
          serial: SERIAL,
          model: 'sdk_gphone64_x86_64',
          osVersion: '14',
          apiLevel: 34,
          connectionKind: 'emulator',
          state: 'online',
        },
        {
          serial: '192.168.1.100:5555',
          model: 'Pixel_7',
          osVersion: 'Unknown',
          apiLevel: 0,
          connectionKind: 'network',
          state: 'unauthorized',
        },
      ],
    });
  });

  it('should read the app links of a package', async () => {
    commands.shell(`pm get-app-links ${PACKAGE}`, getAppLinksOutput);

    expect(await callToolJson('get_android_app_links', { packageName: PACKAGE })).toEqual({
      deviceId: SERIAL,
      apiLevel: 34,
      dialect: 'app-links',
      appLinks: [
        {
          packageName: PACKAGE,
          domains: [{ domain: 'shop.example.com', state: 'VERIFIED', fingerprint }],
        },
      ],
    });
  });

  it('should request re-verification', async () => {
    commands.shell(`pm verify-app-links --re-verify ${PACKAGE}`, '');

    expect(await callToolJson('force_android_app_links_reverify', { deviceId: SERIAL, packageName: PACKAGE })).toEqual({
      deviceId: SERIAL,
      packageName: PACKAGE,
      command: `pm verify-app-links --re-verify ${PACKAGE}`,
      output: '',
    });
  });

  it('should validate an assetlinks.json without a device', async () => {
    network.serve(ASSET_LINKS_URL, jsonResponse(assetLinksDocument(PACKAGE, [fingerprint])));

    expect(
      await callToolJson('validate_asset_links', {
        domain: 'https://shop.example.com/',
        packageName: PACKAGE,
        fingerprint,
      })
    ).toMatchObject({ domain: 'shop.example.com', url: ASSET_LINKS_URL, status: 'VALID', issues: [] });
    expect(commands.calls).toEqual([]);
  });

  it('should diagnose the verified domains of a package', async () => {
    commands.shell(`pm get-app-links ${PACKAGE}`, getAppLinksOutput);
    network.serve(ASSET_LINKS_URL, jsonResponse(assetLinksDocument(PACKAGE, [fingerprint])));

    expect(await callToolJson('diagnose_android_app_links', { packageName: PACKAGE })).toEqual({
      packageName: PACKAGE,
      deviceSerial: SERIAL,
      apiLevel: 34,
      dialect: 'app-links',
      localFingerprint: fingerprint,
      domainResults: [
        {
          domain: 'shop.example.com',
          verificationState: 'VERIFIED',
          assetLinksStatus: 'VALID',
          fingerprintComparison: { kind: 'MATCH' },
          failureReasons: [],
          suggestions: [],
        },
      ],
      totalDomains: 1,
      verifiedDomains: 1,
      failedDomains: 0,
    });
  });

  it('should summarize the manifest of a package', async () => {
    const dump = fs.readFileSync(path.join(__dirname, '../fixtures/dumpsys-package.txt'), 'utf-8');
    commands.shell(`dumpsys package ${PACKAGE}`, dump);

    expect(await callToolJson('analyze_android_manifest', { packageName: PACKAGE })).toMatchObject({
      deviceId: SERIAL,
      manifest: { packageName: PACKAGE, versionName: '2.3.1', versionCode: 42 },
      summary: { supportsAppLinks: true, customSchemeLinks: ['shop://open'] },
    });
  });

  it('should read the deep link log with the default tags', async () => {
    commands.stream(
      [
        'logcat',
        '-d',
        '-v',
        'time',
        '-t',
        '500',
        '-s',
        'ActivityTaskManager:V',
        'IntentResolver:V',
        'PackageManager:V',
        'BrowserActivity:V',
        'ResolverActivity:V',
      ],
      ['10-19 14:02:12.410 I/ActivityTaskManager( 1571): Displayed com.example.shop/.MainActivity: +412ms']
    );

    expect(await callToolJson('get_android_deep_link_log')).toEqual({
      deviceId: SERIAL,
      command:
        'adb logcat -d -v time -t 500 -s ActivityTaskManager:V IntentResolver:V PackageManager:V BrowserActivity:V ResolverActivity:V',
      entries: [
        {
          timestamp: '10-19 14:02:12.410',
          level: 'INFO',
          tag: 'ActivityTaskManager',
          message: 'Displayed com.example.shop/.MainActivity: +412ms',
          deepLinkEvent: { type: 'RESULT', description: 'Displayed com.example.shop/.MainActivity: +412ms' },
        },
      ],
    });
  });

  it('should report invalid arguments', async () => {
    expect(await callTool('force_android_app_links_reverify', { packageName: 'not-a-package' })).toEqual({
      isError: true,
      text: 'INVALID_ARGUMENTS: packageName: Invalid Android package name',
    });
  });

  it('should report a device that is not online', async () => {
    expect(await callTool('get_android_app_links', { deviceId: '192.168.1.100:5555' })).toEqual({
      isError: true,
      text: "DEVICE_NOT_AVAILABLE: Device '192.168.1.100:5555' is not available (state: unauthorized)\n\nSuggestion: Accept the USB debugging prompt on the device",
    });
  });

  it('should report missing devices', async () => {
    commands.respond(['devices', '-l'], mockEmptyDeviceListOutput);

    expect(await callTool('diagnose_android_app_links', { packageName: PACKAGE })).toEqual({
      isError: true,
      text: 'NO_DEVICES_FOUND: No Android devices found\n\nSuggestion: Please connect an Android device or start an emulator and ensure USB debugging is enabled',
    });
  });

  it('should reject unknown tools', async () => {
    expect(await callTool('reboot_device')).toEqual({ isError: true, text: 'Unknown tool: reboot_device' });
  });
});
