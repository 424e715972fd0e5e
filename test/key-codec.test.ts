import { expect } from 'chai';
import fc from 'fast-check';
import { KeyCodec, snapshot } from '../src/key-codec';
import { IdentityRegistry } from '../src/identity-registry';
import { createContext, encodeKey } from '../src/context';
import { InvalidKeyError } from '../src/errors';

describe('KeyCodec', () => {
    let codec: KeyCodec;

    beforeEach(() => {
        codec = new KeyCodec(new IdentityRegistry());
    });

    it('prefixes every kind', () => {
        expect(codec.encode(null)).to.equal('N');
        expect(codec.encode(undefined)).to.equal('U');
        expect(codec.encode(true)).to.equal('b:1');
        expect(codec.encode(false)).to.equal('b:0');
        expect(codec.encode(1)).to.equal('i:1');
        expect(codec.encode(-42)).to.equal('i:-42');
        expect(codec.encode(1n)).to.equal('n:1');
        expect(codec.encode(1.5)).to.equal('d:1.5');
        expect(codec.encode('1')).to.equal('s:1');
    });

    it('never lets different kinds meet', () => {
        const indexes = [1, '1', true, 1n, [1], null, undefined].map((value) => codec.encode(value));
        expect(new Set(indexes).size).to.equal(indexes.length);
    });

    it('encodes -0 like 0', () => {
        expect(codec.encode(-0)).to.equal(codec.encode(0));
    });

    it('encodes arrays structurally and in order', () => {
        expect(codec.encode([1, 'a'])).to.equal('a[i:1|s:a]');
        expect(codec.encode([1, 2, 3])).to.equal(codec.encode([1, 2, 3]));
        expect(codec.encode([1, 2, 3])).to.not.equal(codec.encode([3, 2, 1]));
        expect(codec.encode([[1], 2])).to.equal('a[a[i:1]|i:2]');
    });

    it('escapes separators inside elements', () => {
        expect(codec.encode(['a|b'])).to.equal('a[s:a\\|b]');
        expect(codec.encode(['a', 'b'])).to.equal('a[s:a|s:b]');
        expect(codec.encode([[1, 2]])).to.equal('a[a[i:1\\|i:2]]');
        expect(codec.encode([[1, 2]])).to.not.equal(codec.encode([[1], [2]]));
    });

    it('encodes holes as undefined', () => {
        expect(codec.encode([, 1])).to.equal('a[U|i:1]');
    });

    it('keeps instances apart and stable', () => {
        const first = {id: 1};
        const second = {id: 1};
        expect(codec.encode(first)).to.equal('o:1');
        expect(codec.encode(second)).to.equal('o:2');
        expect(codec.encode(first)).to.equal('o:1');
        expect(codec.encode(() => 1)).to.equal('c:3');
        expect(codec.encode(Symbol('s'))).to.equal('h:4');
        expect(codec.encode([first])).to.equal('a[o:1]');
    });

    it('rejects NaN', () => {
        expect(() => codec.encode(NaN)).to.throw(InvalidKeyError, 'Invalid key: NaN cannot be used as a key.');
        expect(() => codec.encode([1, NaN])).to.throw(InvalidKeyError);
        expect(codec.tryEncode(NaN)).to.equal(undefined);
        expect(codec.tryEncode([1, [NaN]])).to.equal(undefined);
        expect(codec.tryEncode('x')).to.equal('s:x');
    });

    it('rejects arrays that contain themselves', () => {
        const loop: unknown[] = [1];
        loop.push(loop);
        expect(() => codec.encode(loop)).to.throw(InvalidKeyError, 'Invalid key: a cyclic array cannot be used as a key.');
        expect(() => codec.encode([[loop]])).to.throw(InvalidKeyError);
        expect(codec.tryEncode(loop)).to.equal(undefined);
        expect(codec.tryEncode([[loop]])).to.equal(undefined);
    });

    it('encodes an array that appears twice without containing itself', () => {
        const inner = [1];
        expect(codec.encode([inner, inner])).to.equal('a[a[i:1]|a[i:1]]');
        expect(codec.tryEncode([inner, inner])).to.equal('a[a[i:1]|a[i:1]]');
    });

    it('looks up without minting tokens', () => {
        const object = {};
        expect(codec.tryEncode(object)).to.equal(undefined);
        expect(codec.tryEncode([Symbol('s')])).to.equal(undefined);
        expect(codec.tryEncode(() => 1)).to.equal(undefined);
        expect(codec.identities.minted).to.equal(0);

        expect(codec.encode(object)).to.equal('o:1');
        expect(codec.tryEncode(object)).to.equal('o:1');
        expect(codec.tryEncode([object, 'x'])).to.equal('a[o:1|s:x]');
        expect(codec.identities.minted).to.equal(1);
    });

    it('is injective over scalars', () => {
        const scalar = fc.oneof(fc.integer(), fc.string(), fc.boolean(), fc.constant(null));
        fc.assert(
            fc.property(scalar, scalar, (a, b) => (codec.encode(a) === codec.encode(b)) === (a === b))
        );
    });

    it('is injective over flat arrays', () => {
        const list = fc.array(fc.oneof(fc.integer(), fc.string()));
        fc.assert(
            fc.property(list, list, (a, b) =>
                (codec.encode(a) === codec.encode(b)) === (JSON.stringify(a) === JSON.stringify(b))
            )
        );
    });
});

describe('snapshot', () => {
    it('deep-freezes a copy of an array', () => {
        const inner = [2];
        const original = [1, inner];
        const copy = snapshot(original);
        expect(copy).to.not.equal(original);
        expect(copy).to.deep.equal([1, [2]]);
        expect(Object.isFrozen(copy)).to.be.true;
        expect(Object.isFrozen(copy[1])).to.be.true;
        inner.push(3);
        expect(copy).to.deep.equal([1, [2]]);
    });

    it('returns other values as they are', () => {
        const object = {a: 1};
        expect(snapshot(object)).to.equal(object);
        expect(Object.isFrozen(object)).to.be.false;
    });

    it('rejects arrays that contain themselves', () => {
        const loop: unknown[] = [];
        loop.push([loop]);
        expect(() => snapshot(loop)).to.throw(InvalidKeyError, 'Invalid key: a cyclic array cannot be used as a key.');
    });

    it('copies an array that appears twice', () => {
        const inner = [1];
        expect(snapshot([inner, inner])).to.deep.equal([[1], [1]]);
    });
});

describe('IdentityRegistry', () => {
    it('mints one token per instance', () => {
        const registry = new IdentityRegistry();
        const object = {};
        const symbol = Symbol('key');
        expect(registry.peek(object)).to.equal(undefined);
        expect(registry.tokenFor(object)).to.equal('1');
        expect(registry.tokenFor(symbol)).to.equal('2');
        expect(registry.tokenFor(object)).to.equal('1');
        expect(registry.peek(symbol)).to.equal('2');
        expect(registry.minted).to.equal(2);
    });

    it('uses base-36 tokens', () => {
        const registry = new IdentityRegistry();
        let token = '';
        for (let i = 0; i < 36; i++) token = registry.tokenFor({});
        expect(token).to.equal('10');
    });
});

describe('CollectionContext', () => {
    it('isolates identity tokens per context', () => {
        const a = createContext({level: null});
        const b = createContext({level: null});
        const shared = {};
        a.codec.encode({});
        expect(a.codec.encode(shared)).to.equal('o:2');
        expect(b.codec.encode(shared)).to.equal('o:1');
    });

    it('encodeKey uses the default context', () => {
        expect(encodeKey(null)).to.equal('N');
        expect(encodeKey(['x'])).to.equal('a[s:x]');
    });
});
