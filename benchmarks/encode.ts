import { bench } from 'mitata';
import { s } from '../src/index.js';

import { specs } from './_specs.js';

export function registerEncode(): void {
  for (const spec of specs) {
    for (const [description, test] of spec.tests) {
      bench(`encode: ${spec.description} - ${description}`, () => {
        s.encode(spec.codec, test.input);
      }).gc('inner');
    }
  }
}
