import { describe, it, expect } from 'vitest';
import { buildArguments, ValidationError } from '../../src/execution/ArgumentBuilder';
import type { CommandTemplate, OptionSpec, PlatformVariant } from '../../src/tools/ToolTypes';

function option(id: string, type: OptionSpec['type'], extra: Partial<OptionSpec> = {}): OptionSpec {
  return { id, label: id.toUpperCase(), type, inputType: type === 'checkbox' ? 'checkbox' : 'text', required: false, ...extra };
}

const scanVariant: PlatformVariant = {
  base: 'scan',
  flags: {
    verbose: { kind: 'single', token: '-v' },
    ports: { kind: 'single', token: '-p' },
    aggressive: { kind: 'multi', tokens: ['-A', '-T4'] },
    script: { kind: 'multi', tokens: ['--script'] },
    quiet: { kind: 'none' },
  },
};

const scanTemplate: CommandTemplate = {
  id: 'scan',
  variants: { unix: scanVariant },
  options: [
    option('target', 'value', { label: 'Target', required: true }),
    option('ports', 'value'),
    option('verbose', 'checkbox'),
    option('aggressive', 'checkbox'),
    option('script', 'value'),
    option('quiet', 'checkbox'),
    option('unbound', 'value'),
  ],
  targetOptionId: 'target',
};

function argv(params: Record<string, string | number | boolean | null>): string[] {
  const r = buildArguments(scanTemplate, scanVariant, params, 'unix');
  if (!r.ok) throw r.error;
  return r.argv;
}

describe('buildArguments', () => {
  it('follows the declared option order, not the order of the params', () => {
    expect(argv({ verbose: true, ports: '22,80', target: 'host.test' })).toEqual(['scan', '-p', '22,80', '-v', 'host.test']);
    expect(argv({ target: 'host.test', ports: '22,80', verbose: true })).toEqual(['scan', '-p', '22,80', '-v', 'host.test']);
  });

  it('fails fast on a missing required value', () => {
    const r = buildArguments(scanTemplate, scanVariant, { verbose: true }, 'unix');
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error).toBeInstanceOf(ValidationError);
    expect(r.error.missingOption).toBe('Target');
    expect(r.error.message).toBe('Target is required');
  });

  it.each([[''], [0], [false], [null]])('treats %j as missing for a required value option', value => {
    const r = buildArguments(scanTemplate, scanVariant, { target: value }, 'unix');
    expect(r.ok).toBe(false);
  });

  it('emits a checkbox flag exactly once when true and never when falsy', () => {
    expect(argv({ target: 'h', verbose: true })).toEqual(['scan', '-v', 'h']);
    expect(argv({ target: 'h', verbose: false })).toEqual(['scan', 'h']);
    expect(argv({ target: 'h', verbose: 0 })).toEqual(['scan', 'h']);
    expect(argv({ target: 'h', verbose: '' })).toEqual(['scan', 'h']);
  });

  it('expands list-valued flags for checkboxes and values', () => {
    expect(argv({ target: 'h', aggressive: true, script: 'default,vuln' })).toEqual(['scan', '-A', '-T4', '--script', 'default,vuln', 'h']);
  });

  it('renders non-string values as text', () => {
    expect(argv({ target: 8080, ports: 443 })).toEqual(['scan', '-p', '443', '8080']);
    expect(argv({ target: 'h', ports: true })).toEqual(['scan', '-p', 'true', 'h']);
  });

  it('skips falsy optional values, unbound options and unknown params', () => {
    expect(argv({ target: 'h', ports: 0, quiet: true, unbound: 'x', extra: 'ignored' })).toEqual(['scan', 'h']);
  });

  it('does not pick up inherited object properties as params', () => {
    const r = buildArguments(
      { id: 't', variants: {}, options: [option('toString', 'value', { required: true, label: 'Name' })] },
      { base: 't', flags: {} },
      {},
      'unix',
    );
    expect(r.ok).toBe(false);
  });

  it('applies a required checkbox like any other required option', () => {
    const template: CommandTemplate = {
      id: 'wipe',
      variants: {},
      options: [option('confirm', 'checkbox', { label: 'Confirm', required: true })],
    };
    const variant: PlatformVariant = { base: 'wipe', flags: { confirm: { kind: 'single', token: '--yes' } } };
    const r = buildArguments(template, variant, { confirm: false }, 'unix');
    expect(r.ok ? null : r.error.message).toBe('Confirm is required');
    expect(buildArguments(template, variant, { confirm: true }, 'unix')).toEqual({ ok: true, argv: ['wipe', '--yes'] });
  });

  it('ignores options that do not apply to the platform, even required ones', () => {
    const template: CommandTemplate = {
      id: 'ping',
      variants: {},
      options: [
        option('numeric', 'checkbox', { supportedPlatforms: ['unix'] }),
        option('iface', 'value', { supportedPlatforms: ['unix'], required: true, label: 'Interface' }),
        option('host', 'value', { required: true, label: 'Host' }),
      ],
      targetOptionId: 'host',
    };
    const variant: PlatformVariant = { base: 'ping', flags: { numeric: { kind: 'single', token: '-n' }, iface: { kind: 'single', token: '-I' } } };
    expect(buildArguments(template, variant, { numeric: true, host: 'h' }, 'windows')).toEqual({ ok: true, argv: ['ping', 'h'] });
    const onUnix = buildArguments(template, variant, { numeric: true, host: 'h' }, 'unix');
    expect(onUnix.ok ? null : onUnix.error.missingOption).toBe('Interface');
  });

  it('omits the positional target when it is empty', () => {
    const template: CommandTemplate = { id: 'ls', variants: {}, options: [], targetOptionId: 'path' };
    expect(buildArguments(template, { base: 'ls', flags: {} }, { path: '' }, 'unix')).toEqual({ ok: true, argv: ['ls'] });
    expect(buildArguments(template, { base: 'ls', flags: {} }, { path: '/tmp' }, 'unix')).toEqual({ ok: true, argv: ['ls', '/tmp'] });
  });
});
