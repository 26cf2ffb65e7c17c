/**
 * Schema-directed conversion
 */
import { describe, it, expect } from 'vitest';
import {
  absentValue,
  boolValue,
  dynamicValue,
  listSchema,
  listValue,
  mapSchema,
  mapValue,
  numberValue,
  objectSchema,
  objectValue,
  scalarSchema,
  setSchema,
  setValue,
  stringValue,
  type AbsentValue,
  type FieldSchema,
  flattenValue,
  visitValue,
  type JsonValue,
} from '@kubeimport/types';
import { ConversionError } from '../../src/errors.js';
import { backfillUnknowns } from '../../src/convert/backfill.js';
import { formatPlainNumber, toTypedValue } from '../../src/convert/to-value.js';

const string = scalarSchema('string');
const number = scalarSchema('number');
const bool = scalarSchema('bool');

const podSpecSchema = objectSchema({
  replicas: number,
  paused: bool,
  ports: listSchema(number),
  hosts: setSchema(string),
});
const podSchema = objectSchema({
  metadata: objectSchema({ name: string, labels: mapSchema(string) }),
  spec: podSpecSchema,
});

function conversionMessage(raw: JsonValue, schema: FieldSchema): string {
  try {
    toTypedValue(raw, schema);
  } catch (error) {
    if (error instanceof ConversionError) {
      return error.message;
    }
    throw error;
  }
  throw new Error('expected ConversionError');
}

describe('toTypedValue', () => {
  describe('scalars', () => {
    it('keeps values of the declared kind', () => {
      expect(toTypedValue('web', string)).toEqual(stringValue('web'));
      expect(toTypedValue(3, number)).toEqual(numberValue(3));
      expect(toTypedValue(false, bool)).toEqual(boolValue(false));
    });

    it('renders numbers at string positions', () => {
      expect(toTypedValue(8080, string)).toEqual(stringValue('8080'));
      expect(toTypedValue(1e21, string)).toEqual(stringValue('1000000000000000000000'));
    });

    it('reads integer strings at number positions', () => {
      expect(toTypedValue('42', number)).toEqual(numberValue(42));
      expect(toTypedValue('-7', number)).toEqual(numberValue(-7));
    });

    it('reads boolean strings at bool positions', () => {
      expect(toTypedValue('True', bool)).toEqual(boolValue(true));
      expect(toTypedValue('t', bool)).toEqual(boolValue(true));
      expect(toTypedValue('0', bool)).toEqual(boolValue(false));
      expect(toTypedValue('FALSE', bool)).toEqual(boolValue(false));
    });

    it('rejects integer strings beyond the exact range', () => {
      expect(toTypedValue('9007199254740991', number)).toEqual(numberValue(9007199254740991));
      expect(conversionMessage('9007199254740993', number)).toBe(
        '(root): integer "9007199254740993" is too large to represent exactly',
      );
    });

    it('rejects unparsable strings', () => {
      expect(conversionMessage('4.5', number)).toBe('(root): cannot parse "4.5" as number');
      expect(conversionMessage('yes', bool)).toBe('(root): cannot parse "yes" as bool');
    });

    it('rejects values of another shape', () => {
      expect(conversionMessage(true, string)).toBe('(root): expected string, got bool');
      expect(conversionMessage({}, number)).toBe('(root): expected number, got object');
    });

    it('keeps anything at dynamic positions', () => {
      expect(toTypedValue({ a: [1, null] }, scalarSchema('dynamic'))).toEqual(
        dynamicValue({ a: [1, null] }),
      );
    });
  });

  describe('missing data', () => {
    it('turns null and undefined into absent placeholders of the position schema', () => {
      expect(toTypedValue(null, number)).toEqual(absentValue(number));
      expect(toTypedValue(undefined, listSchema(string))).toEqual(absentValue(listSchema(string)));
    });

    it('creates placeholders for declared attributes the object lacks', () => {
      const converted = toTypedValue({ metadata: { name: 'web' } }, podSchema);
      expect(converted).toEqual(
        objectValue<AbsentValue>([
          [
            'metadata',
            objectValue<AbsentValue>([
              ['name', stringValue('web')],
              ['labels', absentValue(mapSchema(string))],
            ]),
          ],
          ['spec', absentValue(podSpecSchema)],
        ]),
      );
    });
  });

  describe('collections', () => {
    it('drops keys the schema does not declare', () => {
      const converted = toTypedValue({ name: 'web', extra: 'ignored' }, objectSchema({ name: string }));
      expect(converted).toEqual(objectValue<AbsentValue>([['name', stringValue('web')]]));
    });

    it('converts map entries and list elements', () => {
      expect(toTypedValue({ app: 'web', port: 80 }, mapSchema(string))).toEqual(
        mapValue<AbsentValue>([
          ['app', stringValue('web')],
          ['port', stringValue('80')],
        ]),
      );
      expect(toTypedValue([80, '443', null], listSchema(number))).toEqual(
        listValue<AbsentValue>([numberValue(80), numberValue(443), absentValue(number)]),
      );
    });

    it('keeps the first of equal set elements', () => {
      expect(toTypedValue(['a', 'b', 'a'], setSchema(string))).toEqual(
        setValue<AbsentValue>([stringValue('a'), stringValue('b')]),
      );
    });

    it('treats map keys named like Object.prototype members as data', () => {
      const raw: JsonValue = JSON.parse('{"__proto__":"x","constructor":"y"}');
      const converted = toTypedValue(raw, mapSchema(string));
      expect(converted.kind).toBe('map');
      if (converted.kind === 'map') {
        expect([...converted.entries.keys()]).toEqual(['__proto__', 'constructor']);
      }
    });

    it('reports the path of a nested failure', () => {
      expect(conversionMessage({ spec: { replicas: 'two' } }, podSchema)).toBe(
        'spec.replicas: cannot parse "two" as number',
      );
      expect(conversionMessage({ spec: { ports: [80, 'http'] } }, podSchema)).toBe(
        'spec.ports[1]: cannot parse "http" as number',
      );
      expect(conversionMessage({ metadata: { labels: { app: [] } } }, podSchema)).toBe(
        'metadata.labels["app"]: expected string, got array',
      );
      expect(conversionMessage({ spec: { hosts: 'a' } }, podSchema)).toBe(
        'spec.hosts: expected set(string), got string',
      );
    });
  });
});

describe('formatPlainNumber', () => {
  it('writes numbers without exponent notation', () => {
    expect(formatPlainNumber(42)).toBe('42');
    expect(formatPlainNumber(0.5)).toBe('0.5');
    expect(formatPlainNumber(1e21)).toBe('1000000000000000000000');
    expect(formatPlainNumber(-2.5e22)).toBe('-25000000000000000000000');
    expect(formatPlainNumber(1.5e-7)).toBe('0.00000015');
  });
});

describe('conversion of conforming data', () => {
  it('leaves no placeholders and flattens back to the input', () => {
    const raw = {
      metadata: { name: 'web', labels: { app: 'web', tier: 'front' } },
      spec: { replicas: 2, paused: false, ports: [80, 443], hosts: ['a.test', 'b.test'] },
    };

    const value = backfillUnknowns(podSchema, toTypedValue(raw, podSchema));

    const placeholders: string[] = [];
    visitValue(value, (node, path) => {
      if (node.kind === 'absent' || node.kind === 'pending') {
        placeholders.push(path.toString());
      }
    });
    expect(placeholders).toEqual([]);
    expect(flattenValue(value)).toEqual(raw);
  });
});
