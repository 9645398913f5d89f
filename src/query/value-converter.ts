import { OutOfBoundsError, UnsupportedTypeError } from '../common/errors';
import { descriptorFor } from '../common/type-map';
import { NULL_VALUE, Value } from '../common/types';
import type { WireObject, WireScalar } from '../wire/types';

function decodeScalar(code: number, raw: WireScalar): Value {
  const descriptor = descriptorFor(code);
  if (!descriptor) {
    throw new UnsupportedTypeError(code);
  }
  return descriptor.isNullRaw(raw) ? NULL_VALUE : descriptor.fromWire(raw);
}

// An empty nested element, such as an empty string, has no first value
function convertNested(item: WireObject): Value {
  if ((item.kind === 'vector' && item.values.length === 0) || (item.kind === 'list' && item.items.length === 0)) {
    return NULL_VALUE;
  }
  return convert(item, 0);
}

/**
 * Canonical value of one wire element
 * Atoms ignore the index; a list converts its element at the index
 */
export function convert(wire: WireObject, index = 0): Value {
  switch (wire.kind) {
    case 'atom':
      return decodeScalar(wire.type, wire.value);
    case 'vector': {
      if (index < 0 || index >= wire.values.length) {
        throw new OutOfBoundsError('element', index, wire.values.length);
      }
      return decodeScalar(wire.type, wire.values[index]);
    }
    case 'list': {
      if (index < 0 || index >= wire.items.length) {
        throw new OutOfBoundsError('element', index, wire.items.length);
      }
      return convertNested(wire.items[index]);
    }
    case 'null':
      return NULL_VALUE;
    default:
      throw new UnsupportedTypeError(wire.type);
  }
}

