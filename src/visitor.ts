/**
 * Visitor interface for decoding straight into an application type.
 *
 * The decoder calls exactly one `visit*` method per value. Scalars arrive
 * decoded; containers arrive as an access object the visitor pulls elements
 * from. A visitor that leaves a method out rejects that kind of value.
 */

import { EdnChar, EdnKeyword, EdnList, EdnMap, EdnSet, EdnSymbol, type EdnValue } from './ast.js';

export interface SeqAccess {
  /** Decodes the next element with `visitor`, or reports the end of the sequence. */
  nextElement<U>(visitor: Visitor<U>): IteratorResult<U, undefined>;
  /** Skips the next element; false at the end of the sequence. */
  skipElement(): boolean;
}

export interface MapAccess {
  /** Decodes the next key, or reports the end of the map. */
  nextKey<U>(visitor: Visitor<U>): IteratorResult<U, undefined>;
  /** Decodes the value belonging to the key just read. */
  nextValue<U>(visitor: Visitor<U>): U;
  skipValue(): void;
}

export interface Visitor<T> {
  /** What the visitor accepts, for "invalid type" messages. */
  readonly expecting: string;
  visitNil?(): T;
  visitBool?(value: boolean): T;
  visitInteger?(value: bigint): T;
  visitFloat?(value: number): T;
  visitString?(value: string): T;
  /** One code point. */
  visitChar?(value: string): T;
  visitKeyword?(name: string): T;
  visitSymbol?(name: string): T;
  visitList?(seq: SeqAccess): T;
  visitVector?(seq: SeqAccess): T;
  visitSet?(seq: SeqAccess): T;
  visitMap?(map: MapAccess): T;
  /**
   * When present, the value is skipped without being decoded and no other
   * method is called.
   */
  visitIgnored?(): T;
}

function collect<U>(seq: SeqAccess, visitor: Visitor<U>): U[] {
  const out: U[] = [];
  for (let step = seq.nextElement(visitor); !step.done; step = seq.nextElement(visitor)) {
    out.push(step.value);
  }
  return out;
}

/** Builds the same `EdnValue` the direct value path builds. */
export class ValueVisitor implements Visitor<EdnValue> {
  readonly expecting = 'any EDN value';

  visitNil(): EdnValue {
    return null;
  }

  visitBool(value: boolean): EdnValue {
    return value;
  }

  visitInteger(value: bigint): EdnValue {
    return value;
  }

  visitFloat(value: number): EdnValue {
    return value;
  }

  visitString(value: string): EdnValue {
    return value;
  }

  visitChar(value: string): EdnValue {
    return new EdnChar(value);
  }

  visitKeyword(name: string): EdnValue {
    return new EdnKeyword(name);
  }

  visitSymbol(name: string): EdnValue {
    return new EdnSymbol(name);
  }

  visitList(seq: SeqAccess): EdnValue {
    return new EdnList(collect(seq, this));
  }

  visitVector(seq: SeqAccess): EdnValue {
    return collect(seq, this);
  }

  visitSet(seq: SeqAccess): EdnValue {
    return new EdnSet(collect(seq, this));
  }

  visitMap(map: MapAccess): EdnValue {
    const out = new EdnMap();
    for (let key = map.nextKey(this); !key.done; key = map.nextKey(this)) {
      out.set(key.value, map.nextValue(this));
    }
    return out;
  }
}

/** Plain JavaScript data: what `toNative` and the typed bridge produce. */
export type NativeValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | NativeValue[]
  | Set<NativeValue>
  | Map<NativeValue, NativeValue>
  | { [key: string]: NativeValue };

/** Integers inside the safe range become numbers; larger ones stay bigint. */
export function nativeInteger(value: bigint): number | bigint {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(value)
    : value;
}

/** A map key and whether it came from a string, keyword or symbol. */
interface NativeKey {
  named: boolean;
  value: NativeValue;
}

/**
 * Decodes into plain JavaScript data without building an `EdnValue` first.
 * Maps keyed only by names become objects; any other map becomes a `Map`.
 */
export class NativeVisitor implements Visitor<NativeValue> {
  readonly expecting = 'any EDN value';

  private readonly keys: Visitor<NativeKey> = {
    expecting: 'a map key',
    visitNil: () => ({ named: false, value: null }),
    visitBool: (v) => ({ named: false, value: v }),
    visitInteger: (v) => ({ named: false, value: nativeInteger(v) }),
    visitFloat: (v) => ({ named: false, value: v }),
    visitString: (v) => ({ named: true, value: v }),
    visitChar: (v) => ({ named: false, value: v }),
    visitKeyword: (v) => ({ named: true, value: v }),
    visitSymbol: (v) => ({ named: true, value: v }),
    visitList: (seq) => ({ named: false, value: this.visitList(seq) }),
    visitVector: (seq) => ({ named: false, value: this.visitVector(seq) }),
    visitSet: (seq) => ({ named: false, value: this.visitSet(seq) }),
    visitMap: (map) => ({ named: false, value: this.visitMap(map) }),
  };

  visitNil(): NativeValue {
    return null;
  }

  visitBool(value: boolean): NativeValue {
    return value;
  }

  visitInteger(value: bigint): NativeValue {
    return nativeInteger(value);
  }

  visitFloat(value: number): NativeValue {
    return value;
  }

  visitString(value: string): NativeValue {
    return value;
  }

  visitChar(value: string): NativeValue {
    return value;
  }

  visitKeyword(name: string): NativeValue {
    return name;
  }

  visitSymbol(name: string): NativeValue {
    return name;
  }

  visitList(seq: SeqAccess): NativeValue {
    return collect(seq, this);
  }

  visitVector(seq: SeqAccess): NativeValue {
    return collect(seq, this);
  }

  visitSet(seq: SeqAccess): NativeValue {
    return new Set(collect(seq, this));
  }

  visitMap(map: MapAccess): NativeValue {
    const entries: [NativeKey, NativeValue][] = [];
    for (let key = map.nextKey(this.keys); !key.done; key = map.nextKey(this.keys)) {
      entries.push([key.value, map.nextValue(this)]);
    }
    return nativeMap(entries);
  }
}

function nativeMap(entries: [NativeKey, NativeValue][]): NativeValue {
  const named: [string, NativeValue][] = [];
  for (const [key, value] of entries) {
    if (!key.named || typeof key.value !== 'string') {
      return new Map(entries.map(([k, v]): [NativeValue, NativeValue] => [k.value, v]));
    }
    named.push([key.value, value]);
  }
  return Object.fromEntries(named);
}

/** Accepts any value and discards it. String bodies and containers are skipped without being decoded. */
export const ignoredAny: Visitor<undefined> = {
  expecting: 'anything',
  visitIgnored: () => undefined,
};
