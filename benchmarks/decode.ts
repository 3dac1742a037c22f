import { bench } from 'mitata';
import { s } from '../src/index.js';

import { specs } from './_specs.js';

export function registerDecode(): void {
  for (const spec of specs) {
    for (const [description, test] of spec.tests) {
      bench(`decode: ${spec.description} - ${description}`, () => {
        s.decode(spec.codec, test.expected);
      }).gc('inner');
    }
  }
}
