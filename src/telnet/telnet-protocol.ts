/**
 * Telnet wire constants (RFC 854 commands plus the options this server
 * negotiates).
 */

export const TelnetCommand = {
  SE: 240,
  NOP: 241,
  DM: 242,
  BRK: 243,
  IP: 244,
  AO: 245,
  AYT: 246,
  EC: 247,
  EL: 248,
  GA: 249,
  SB: 250,
  WILL: 251,
  WONT: 252,
  DO: 253,
  DONT: 254,
  IAC: 255,
} as const;

export const TelnetOption = {
  BINARY: 0,
  ECHO: 1,
  SGA: 3,
  TTYPE: 24,
  NAWS: 31,
  TSPEED: 32,
  NEW_ENVIRON: 39,
} as const;

/** Sub-negotiation verbs shared by TTYPE, TSPEED and NEW-ENVIRON. */
export const TelnetSubcommand = {
  IS: 0,
  SEND: 1,
  INFO: 2,
} as const;

/** NEW-ENVIRON (RFC 1572) item markers. */
export const EnvironMarker = {
  VAR: 0,
  VALUE: 1,
  ESC: 2,
  USERVAR: 3,
} as const;

export type NegotiationVerb =
  | typeof TelnetCommand.WILL
  | typeof TelnetCommand.WONT
  | typeof TelnetCommand.DO
  | typeof TelnetCommand.DONT;

export function isNegotiationVerb(byte: number): byte is NegotiationVerb {
  return byte >= TelnetCommand.WILL && byte <= TelnetCommand.DONT;
}

/** Commands that carry no operand and need no action. */
export const IGNORED_COMMANDS: ReadonlySet<number> = new Set([
  TelnetCommand.NOP,
  TelnetCommand.DM,
  TelnetCommand.BRK,
  TelnetCommand.IP,
  TelnetCommand.AO,
  TelnetCommand.AYT,
  TelnetCommand.EC,
  TelnetCommand.EL,
  TelnetCommand.GA,
]);

/** Longest sub-negotiation payload kept before the rest is discarded. */
export const MAX_SUBNEGOTIATION_BYTES = 4096;

export const CR = 0x0d;
export const LF = 0x0a;
export const NUL = 0x00;

export function negotiation(verb: NegotiationVerb, option: number): number[] {
  return [TelnetCommand.IAC, verb, option];
}

export function subnegotiation(option: number, payload: readonly number[]): number[] {
  const body: number[] = [];
  for (const byte of payload) {
    body.push(byte);
    if (byte === TelnetCommand.IAC) body.push(TelnetCommand.IAC);
  }
  return [TelnetCommand.IAC, TelnetCommand.SB, option, ...body, TelnetCommand.IAC, TelnetCommand.SE];
}
