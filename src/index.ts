export type * from './types';
export { PLACEHOLDER } from './types';

export { createRegistry } from './registry/registry';
export { isRecordType, typeOf } from './registry/record-type';
export { type StandardKinds, registerStandardKinds } from './kinds';

export { assignChainValues } from './parser/chain-order';
export type { ChainAssignment, ChainValueAssignment } from './parser/chain-order';

export {
  emitSnapshotModule,
  printDeclaration,
  readSnapshotModule
} from './emitter/code-emitter';
