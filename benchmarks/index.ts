/**
 * Encode/decode throughput for representative formats.
 *
 * Run with: npm run bench
 */

import { group, run } from 'mitata';

import { registerDecode } from './decode.js';
import { registerEncode } from './encode.js';

group('encode', registerEncode);
group('decode', registerDecode);

await run();
