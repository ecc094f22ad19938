/**
 * @lakehouse/impala-rpc - Service Definitions
 *
 * Service contracts live in JSON files under ./idl and are checked with zod
 * when first loaded.
 */

import { z } from 'zod';

import hs2Document from './idl/hs2.json' with { type: 'json' };
import beeswaxDocument from './idl/beeswax.json' with { type: 'json' };

import type { FieldDef, MethodDef, ServiceDef, StructDef, TypeRef } from './serialization.js';

const scalarSchema = z.enum(['bool', 'byte', 'i16', 'i32', 'i64', 'double', 'string', 'binary']);

const typeRefSchema: z.ZodType<TypeRef> = z.lazy(() =>
  z.union([
    scalarSchema,
    z.object({ struct: z.string().min(1) }).strict(),
    z.object({ list: typeRefSchema }).strict(),
    z.object({ set: typeRefSchema }).strict(),
    z.object({ map: z.tuple([typeRefSchema, typeRefSchema]) }).strict(),
  ])
);

const fieldSchema = z.tuple([z.number().int().min(-32768).max(32767), z.string().min(1), typeRefSchema]);

const idlDocumentSchema = z.object({
  service: z.string().min(1),
  structs: z.record(z.array(fieldSchema)),
  methods: z.record(
    z.object({
      args: z.array(fieldSchema),
      returns: z.union([z.literal('void'), typeRefSchema]),
      throws: z.array(fieldSchema).default([]),
    })
  ),
});

type FieldTuple = z.infer<typeof fieldSchema>;

function toFields(tuples: readonly FieldTuple[]): FieldDef[] {
  return tuples.map(([id, name, type]) => ({ id, name, type }));
}

function collectStructRefs(type: TypeRef, out: Set<string>): void {
  if (typeof type === 'string') return;
  if ('struct' in type) out.add(type.struct);
  else if ('list' in type) collectStructRefs(type.list, out);
  else if ('set' in type) collectStructRefs(type.set, out);
  else {
    collectStructRefs(type.map[0], out);
    collectStructRefs(type.map[1], out);
  }
}

/**
 * Build a service definition from an IDL document.
 *
 * @throws Error if the document is malformed or refers to an undefined struct
 */
export function loadServiceDefinition(document: unknown): ServiceDef {
  const parsed = idlDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new Error(`Invalid service definition: ${parsed.error.message}`);
  }
  const idl = parsed.data;

  const structs = new Map<string, StructDef>();
  const referenced = new Set<string>();
  for (const [name, fields] of Object.entries(idl.structs)) {
    const defs = toFields(fields);
    const ids = new Set(defs.map((field) => field.id));
    if (ids.size !== defs.length) {
      throw new Error(`Invalid service definition: duplicate field id in ${name}`);
    }
    defs.forEach((field) => collectStructRefs(field.type, referenced));
    structs.set(name, { name, fields: defs });
  }

  const methods = new Map<string, MethodDef>();
  for (const [name, method] of Object.entries(idl.methods)) {
    const def: MethodDef = {
      name,
      args: toFields(method.args),
      returns: method.returns,
      throws: toFields(method.throws),
    };
    [...def.args, ...def.throws].forEach((field) => collectStructRefs(field.type, referenced));
    if (def.returns !== 'void') collectStructRefs(def.returns, referenced);
    methods.set(name, def);
  }

  for (const name of referenced) {
    if (!structs.has(name)) {
      throw new Error(`Invalid service definition: ${idl.service} refers to undefined struct ${name}`);
    }
  }

  return { name: idl.service, structs, methods };
}

let richService: ServiceDef | undefined;
let legacyService: ServiceDef | undefined;

/**
 * The rich service contract (HiveServer2 plus engine extensions)
 */
export function getRichService(): ServiceDef {
  richService ??= loadServiceDefinition(hs2Document);
  return richService;
}

/**
 * The legacy (Beeswax) service contract
 */
export function getLegacyService(): ServiceDef {
  legacyService ??= loadServiceDefinition(beeswaxDocument);
  return legacyService;
}
