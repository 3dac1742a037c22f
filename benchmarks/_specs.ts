import { s } from '../src/index.js';

interface Spec<T = unknown> {
  description: string;
  codec: s.Codec<T>,
  tests: Array<[
    description: string,
    test: { input: T, expected: Uint8Array },
  ]>;
}

export function spec<T>(description: string, codec: s.Codec<T>, inputs: [string, T][]): Spec<T> {
  return {
    description,
    codec,
    tests: inputs.map(([description, input]) => [
      description,
      { input, expected: s.encode(codec, input) },
    ]),
  };
}

const Address = s.struct({
  street: s.string,
  city: s.string,
  zipCode: s.string,
  country: s.string,
});

const LineItem = s.struct({
  productId: s.u64,
  name: s.string,
  quantity: s.u32,
  unitPrice: s.f64,
});

export const specs: Spec[] = [
  spec(
    '2D point',
    s.struct({ x: s.f64, y: s.f64 }),
    [
      ['Simple 2D point', { x: 42.5, y: -17.25 }],
    ],
  ),

  spec(
    'Wide integers',
    s.tuple<[bigint, bigint, bigint]>(s.i128, s.u128, s.usize),
    [
      ['i128 / u128 / usize', [-(1n << 100n), (1n << 127n) + 5n, 4096n]],
    ],
  ),

  spec(
    'Nested text',
    s.vec(s.vec(s.string)),
    [
      ['Small', [['ab', 'cd'], ['e']]],
      ['Large', Array.from({ length: 100 }, (_, i) => Array.from({ length: 10 }, (_, j) => `tag-${i}-${j}`))],
    ],
  ),

  spec(
    'Order',
    s.struct({
      orderId: s.u64,
      customerId: s.u64,
      items: s.vec(LineItem),
      shippingAddress: Address,
      totalAmount: s.f64,
      status: s.string,
      createdAt: s.i64,
    }),
    [
      ['Order (small)', {
        orderId: 1001n,
        customerId: 5001n,
        items: [
          { productId: 101n, name: 'Wireless Mouse', quantity: 1, unitPrice: 29.99 },
          { productId: 102n, name: 'USB-C Cable', quantity: 2, unitPrice: 12.99 },
        ],
        shippingAddress: {
          street: '123 Main Street',
          city: 'Springfield',
          zipCode: '00000',
          country: 'Nowhere',
        },
        totalAmount: 55.97,
        status: 'processing',
        createdAt: 1704067200000n,
      }],
      ['Order (large)', {
        orderId: 1002n,
        customerId: 5002n,
        items: Array.from({ length: 50 }, (_, i) => ({
          productId: BigInt(200 + i),
          name: `Product ${i}`,
          quantity: (i % 5) + 1,
          unitPrice: 9.99 + i,
        })),
        shippingAddress: {
          street: '456 Side Road',
          city: 'Shelbyville',
          zipCode: '11111',
          country: 'Nowhere',
        },
        totalAmount: 4321.5,
        status: 'shipped',
        createdAt: 1704153600000n,
      }],
    ],
  ),

  spec(
    'Binary blob',
    s.bytes,
    [
      ['4 KiB payload', Uint8Array.from({ length: 4096 }, (_, i) => i & 0xff)],
    ],
  ),
];
