import { describe, it, expect } from 'vitest';
import os from 'os';
import { describePlatform, detectPlatform, resolveCatalog, resolveTemplate } from '../../src/platform/PlatformResolver';
import { parseCatalog } from '../../src/tools/ToolCatalog';

const catalog = parseCatalog(JSON.stringify({
  ping: {
    windows: { base: 'ping', flags: { count: '-n' } },
    unix: { base: 'ping', flags: { count: '-c', numeric: '-n' } },
    options: [
      { id: 'host', label: 'Host', type: 'text', required: true },
      { id: 'count', label: 'Count', type: 'number' },
      { id: 'numeric', label: 'Numeric', type: 'checkbox', platforms: ['unix'] },
      { id: 'resolve', label: 'Resolve', type: 'checkbox', platforms: ['windows'] },
    ],
    target: 'host',
  },
  nmap: {
    platforms: ['unix'],
    unix: { base: 'nmap' },
    windows: { base: 'nmap.exe' },
    options: [],
  },
  ipconfig: {
    windows: { base: 'ipconfig' },
    options: [],
  },
  hostname: {
    command: { base: 'hostname' },
  },
}), 'json');

describe('PlatformResolver', () => {
  it('classifies node platforms', () => {
    expect(detectPlatform('win32')).toBe('windows');
    expect(detectPlatform('linux')).toBe('unix');
    expect(detectPlatform('darwin')).toBe('unix');
    expect(detectPlatform('freebsd')).toBe('unix');
  });

  it('keeps only tools runnable on unix and drops windows-only options', () => {
    const resolved = resolveCatalog(catalog, 'unix');
    expect(Object.keys(resolved)).toEqual(['ping', 'nmap', 'hostname']);
    expect(resolved.ping.options.map(o => o.id)).toEqual(['host', 'count', 'numeric']);
  });

  it('keeps only tools runnable on windows and drops unix-only options', () => {
    const resolved = resolveCatalog(catalog, 'windows');
    expect(Object.keys(resolved)).toEqual(['ping', 'ipconfig', 'hostname']);
    expect(resolved.ping.options.map(o => o.id)).toEqual(['host', 'count', 'resolve']);
  });

  it('leaves the input catalog untouched', () => {
    resolveCatalog(catalog, 'windows');
    expect(catalog.ping.options).toHaveLength(4);
    expect(resolveTemplate(catalog.nmap, 'windows')).toBeUndefined();
  });

  it('describes the host', () => {
    expect(describePlatform()).toEqual({
      osFamily: detectPlatform(os.platform()),
      rawSystemName: os.type(),
      machineArch: os.machine(),
    });
  });
});
