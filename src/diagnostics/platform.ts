import { parseLabelledGateway, parseRouteTable } from './gateway.js';

export type PlatformFamily = 'linux' | 'windows' | 'darwin';

/**
 * Everything that differs between OS families: how the default gateway is
 * read, how ping spells its count flag, and whether a logon server exists.
 */
export interface PlatformStrategy {
  readonly family: PlatformFamily;
  readonly gatewayCommand: { command: string; args: readonly string[] };
  parseGateway(output: string): string | undefined;
  readonly pingCountFlag: string;
  readonly hasLogonServer: boolean;
}

export const linuxPlatform: PlatformStrategy = {
  family: 'linux',
  gatewayCommand: { command: 'ip', args: ['route'] },
  parseGateway: parseRouteTable,
  pingCountFlag: '-c',
  hasLogonServer: false,
};

export const windowsPlatform: PlatformStrategy = {
  family: 'windows',
  gatewayCommand: { command: 'ipconfig', args: [] },
  parseGateway: output => parseLabelledGateway(output, 'Default Gateway'),
  pingCountFlag: '-n',
  hasLogonServer: true,
};

export const darwinPlatform: PlatformStrategy = {
  family: 'darwin',
  gatewayCommand: { command: 'route', args: ['-n', 'get', 'default'] },
  parseGateway: output => parseLabelledGateway(output, 'gateway:'),
  pingCountFlag: '-c',
  hasLogonServer: false,
};

/** Any POSIX system other than macOS is read through its routing table. */
export function selectPlatform(platform: NodeJS.Platform = process.platform): PlatformStrategy {
  switch (platform) {
    case 'win32':
      return windowsPlatform;
    case 'darwin':
      return darwinPlatform;
    default:
      return linuxPlatform;
  }
}
