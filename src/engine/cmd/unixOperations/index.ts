export { UnixCommandBase } from './base';
export { B2sumCommand } from './b2sum';
export { CommCommand } from './comm';
export { CpCommand } from './cp';
export { LsCommand } from './ls';
export { MktempCommand } from './mktemp';
export { TailCommand, parseSignedCount } from './tail';
export { TimeoutCommand, parseDuration, parseSignal } from './timeout';
export { parseDigestLength } from './b2sum';

export type { B2sumSettings, CheckOutput } from './b2sum';
export type { CommSettings } from './comm';
export type { CpSettings } from './cp';
export type { LsSettings } from './ls';
export type { MktempSettings } from './mktemp';
export type { TailSettings, SignedCount, FollowMode, TailMode } from './tail';
export type { TimeoutSettings } from './timeout';
