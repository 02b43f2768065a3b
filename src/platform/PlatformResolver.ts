import os from "os";
import type { Catalog, CommandTemplate, PlatformClass } from "../tools/ToolTypes";

export interface PlatformDescription {
  osFamily: PlatformClass;
  rawSystemName: string; // 'Linux', 'Darwin', 'Windows_NT'
  machineArch: string; // 'x86_64', 'arm64'
}

export function detectPlatform(system: NodeJS.Platform = os.platform()): PlatformClass {
  return system === "win32" ? "windows" : "unix";
}

export function describePlatform(): PlatformDescription {
  return {
    osFamily: detectPlatform(),
    rawSystemName: os.type(),
    machineArch: os.machine(),
  };
}

export function supports(platforms: PlatformClass[] | undefined, platform: PlatformClass): boolean {
  return !platforms || platforms.includes(platform);
}

/** Returns the template narrowed to `platform`, or undefined when it cannot run there. */
export function resolveTemplate(template: CommandTemplate, platform: PlatformClass): CommandTemplate | undefined {
  if (!supports(template.supportedPlatforms, platform)) return undefined;
  if (!template.variants[platform]) return undefined;
  return {
    ...template,
    options: template.options.filter(o => supports(o.supportedPlatforms, platform)),
  };
}

export function resolveCatalog(catalog: Catalog, platform: PlatformClass): Catalog {
  const out: Catalog = {};
  for (const [id, template] of Object.entries(catalog)) {
    const resolved = resolveTemplate(template, platform);
    if (resolved) out[id] = resolved;
  }
  return out;
}
