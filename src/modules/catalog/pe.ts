import type { CompilationSession } from '../../session/session.js';
import type { CompositeModule, FieldSpec, ModuleChild } from '../schema.js';
import { createComposite, createLeaf, enumField, referenceField } from '../schema.js';

export const ALU_OPCODES = { add: 0, mul: 1, mac: 2, max: 3 } as const;
export const INPORT_MODES = { buffer: 0, keep: 1, constant: 2 } as const;

export const INPORT_FIELDS: readonly FieldSpec[] = [
  referenceField('src_id', 3),
  { name: 'keep_last_index', width: 4 },
  enumField('mode', 2, INPORT_MODES),
];

/** Processing element, 62 bits: opcode, inport2..0, then three 11-bit constants `[c2, c1, c0]`. */
export function createProcessingElement(session: CompilationSession, name: string): CompositeModule {
  const identity = session.node(name, 'pe');
  const inport = (port: number): ModuleChild => ({
    key: `inport${port}`,
    module: createLeaf(`pes.${name}.inport${port}`, INPORT_FIELDS, identity),
  });
  return createComposite(
    `pes.${name}`,
    [
      { key: undefined, module: createLeaf(`pes.${name}`, [enumField('alu_opcode', 2, ALU_OPCODES)], identity) },
      inport(2),
      inport(1),
      inport(0),
      {
        key: undefined,
        module: createLeaf(`pes.${name}.constants`, [{ name: 'constants', width: 33, elements: 3 }], identity),
      },
    ],
    identity,
  );
}
