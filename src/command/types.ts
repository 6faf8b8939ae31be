/**
 * One user request, validated and with every default applied.
 * Built once per run by the parser and frozen; the dispatcher only reads it.
 */
export type Command =
  | { readonly type: 'fetch-data'; readonly kind: string }
  | { readonly type: 'coaching'; readonly kind: string }
  | { readonly type: 'example'; readonly kind: string };

export type CommandType = Command['type'];

export const DEFAULT_KINDS: Readonly<Record<CommandType, string>> = {
  'fetch-data': 'activities',
  coaching: 'activity',
  example: 'data',
};

// Closed set for `example`; other values are rejected by the dispatcher, not the parser.
export const EXAMPLE_KINDS = ['data', 'ai'] as const;
export type ExampleKind = (typeof EXAMPLE_KINDS)[number];

export function isExampleKind(kind: string): kind is ExampleKind {
  return EXAMPLE_KINDS.some((candidate) => candidate === kind);
}

export function makeCommand(type: CommandType, kind?: string): Command {
  return Object.freeze({ type, kind: kind ?? DEFAULT_KINDS[type] });
}

/** Options that shape how a run behaves but are not part of the request itself. */
export interface GlobalFlags {
  configPath?: string;
  passKind?: boolean;
  timeoutMs?: number;
  verbose?: boolean;
}

export type ParseResult =
  | { readonly type: 'command'; readonly command: Command; readonly flags: GlobalFlags }
  // --help or --version: text to print, nothing to dispatch.
  | { readonly type: 'info'; readonly text: string };
