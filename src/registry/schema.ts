/**
 * Shape accepted for a previously published registry.
 *
 * Only the parts the merge reads are checked; everything else passes through.
 */

import { Type, type Static } from '@sinclair/typebox';

export const SnapshotAgentSchema = Type.Object({
  metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const RegistrySnapshotSchema = Type.Object({
  agents: Type.Optional(Type.Record(Type.String(), SnapshotAgentSchema)),
});

export type RegistrySnapshot = Static<typeof RegistrySnapshotSchema>;

export const EMPTY_SNAPSHOT: RegistrySnapshot = Object.freeze({ agents: {} });
