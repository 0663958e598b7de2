/**
 * Terminal graphics protocol selector.
 *
 * `Default` resolves to the first available protocol at first use; `None`
 * means no graphics at all.
 */

import { TermGraphicsError } from './errors.ts';

export const TermType = {
  None: 'none',
  Kitty: 'kitty',
  ITerm: 'iterm',
  Sixel: 'sixel',
  Default: 'default',
} as const;

export type TermType = typeof TermType[keyof typeof TermType];

// Text tokens written by marshalTermType; Default marshals to ''
const MARSHAL_TOKENS: ReadonlyMap<TermType, string> = new Map<TermType, string>([
  [TermType.None, 'none'],
  [TermType.Kitty, 'kitty'],
  [TermType.ITerm, 'iterm'],
  [TermType.Sixel, 'sixel'],
  [TermType.Default, ''],
]);

// Tokens recognised by unmarshalTermType; anything else is None
const UNMARSHAL_TOKENS: ReadonlyMap<string, TermType> = new Map<string, TermType>([
  ['kitty', TermType.Kitty],
  ['iterm', TermType.ITerm],
  ['sixel', TermType.Sixel],
  ['', TermType.Default],
]);

export function termTypeToString(type: TermType): string {
  switch (type) {
    case TermType.Kitty:
    case TermType.ITerm:
    case TermType.Sixel:
    case TermType.Default:
      return type;
    default:
      return 'none';
  }
}

/**
 * Value to put in TERM_GRAPHICS to force this type ('' for Default).
 */
export function termTypeEnvValue(type: TermType): string {
  return type === TermType.Default ? '' : termTypeToString(type);
}

export function marshalTermType(type: TermType): string {
  const token = MARSHAL_TOKENS.get(type);
  if (token === undefined) {
    throw new TermGraphicsError('UNKNOWN_TERM_TYPE');
  }
  return token;
}

/**
 * Parse a protocol token, case-insensitively.
 * Unrecognised tokens yield None rather than an error.
 */
export function unmarshalTermType(text: string): TermType {
  return UNMARSHAL_TOKENS.get(text.toLowerCase()) ?? TermType.None;
}
