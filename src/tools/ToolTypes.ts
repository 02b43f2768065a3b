export type PlatformClass = "windows" | "unix";

export const PLATFORM_CLASSES: readonly PlatformClass[] = ["windows", "unix"];

// Argv tokens an option contributes when set
export type FlagBinding =
  | { kind: "none" }
  | { kind: "single"; token: string }
  | { kind: "multi"; tokens: string[] };

export interface PlatformVariant {
  base: string;
  flags: Record<string, FlagBinding>;
}

export type OptionType = "checkbox" | "value";

export interface OptionSpec {
  id: string;
  label: string;
  type: OptionType;
  inputType: string; // as written in the catalog, e.g. 'text', 'number', 'checkbox'
  required: boolean;
  placeholder?: string;
  supportedPlatforms?: PlatformClass[];
}

export interface CommandTemplate {
  id: string;
  name?: string;
  description?: string;
  supportedPlatforms?: PlatformClass[];
  variants: Partial<Record<PlatformClass, PlatformVariant>>;
  options: OptionSpec[];
  targetOptionId?: string;
}

export type Catalog = Record<string, CommandTemplate>;

export type ParamValue = string | number | boolean | null;

export type ToolParams = Record<string, ParamValue | undefined>;

export interface ToolView {
  id: string;
  name: string;
  description?: string;
  platform: PlatformClass;
  base: string;
  target?: string;
  options: Array<{
    id: string;
    label: string;
    type: OptionType;
    inputType: string;
    required: boolean;
    placeholder?: string;
  }>;
}
