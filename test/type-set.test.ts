import { expect } from 'chai';
import fc from 'fast-check';
import { TypeSet } from '../src/type-set';
import { createContext } from '../src/context';
import { InvalidTypeNameError, NoDefaultAvailableError, TypeMismatchError } from '../src/errors';

class Shape {}
class Circle extends Shape {}
class Point {
    constructor(readonly x: number, readonly y: number) {}
}

describe('TypeSet', () => {
    const context = createContext({level: null});
    context.capabilities.declare(Circle, {traits: ['Drawable']});
    context.capabilities.declare(Point, {create: () => new Point(0, 0)});

    describe('parsing', () => {
        it('splits unions', () => {
            const types = TypeSet.fromSpec('int|string', context);
            expect(types.containsAll('int', 'string')).to.be.true;
            expect(types.containsOnly('int', 'string')).to.be.true;
            expect(types.size).to.equal(2);
        });

        it('treats a leading ? as null', () => {
            const types = new TypeSet('?int', context);
            expect(types.containsOnly('null', 'int')).to.be.true;
            expect(types.match(null)).to.be.true;
            expect(types.match(3)).to.be.true;
            expect(types.match('3')).to.be.false;
        });

        it('collapses duplicates and aliases', () => {
            const types = new TypeSet('int|integer| int', context);
            expect(types.size).to.equal(1);
            expect(types.toString()).to.equal('{int}');
        });

        it('accepts several specifications at once', () => {
            const types = new TypeSet(['int', '?string'], context);
            expect(types.containsOnly('int', 'null', 'string')).to.be.true;
        });

        it('canonicalizes names in predicates', () => {
            const types = new TypeSet('int|string', context);
            expect(types.containsOnly('integer', 'text')).to.be.true;
            expect(types.containsAny('float', 'text')).to.be.true;
            expect(types.containsAny('float', 'bool')).to.be.false;
        });

        it('rejects empty members and malformed names', () => {
            expect(() => new TypeSet('int|', context)).to.throw(
                InvalidTypeNameError,
                "Empty type name in specification: 'int|'."
            );
            expect(() => new TypeSet('int|9lives', context)).to.throw(InvalidTypeNameError, "'9lives'");
        });

        it('renders members in insertion order', () => {
            expect(new TypeSet('?int|string', context).toString()).to.equal('{null, int, string}');
        });
    });

    describe('matching', () => {
        it('accepts everything when empty', () => {
            const types = new TypeSet(null, context);
            expect(types.isEmpty()).to.be.true;
            expect(types.anyOk()).to.be.true;
            for (const value of [null, 1, 'text', [1, 2]]) expect(types.match(value)).to.be.true;
        });

        it('keeps mixed as an explicit member', () => {
            const types = new TypeSet('mixed', context);
            expect(types.containsOnly('mixed')).to.be.true;
            expect(types.anyOk()).to.be.true;
            expect(types.nullOk()).to.be.true;
        });

        it('expands pseudo-tags', () => {
            const numbers = new TypeSet('number', context);
            expect(numbers.match(1.5)).to.be.true;
            expect(numbers.match(2n)).to.be.true;
            expect(numbers.match('1')).to.be.false;

            expect(new TypeSet('scalar', context).match(Symbol('s'))).to.be.false;
            expect(new TypeSet('iterable', context).match(new Map())).to.be.true;
            expect(new TypeSet('iterable', context).match('abc')).to.be.false;
            expect(new TypeSet('callable', context).match(() => 1)).to.be.true;
        });

        it('matches named types through ancestry and traits', () => {
            expect(new TypeSet('Shape', context).match(new Circle())).to.be.true;
            expect(new TypeSet('Circle', context).match(new Shape())).to.be.false;
            expect(new TypeSet('Drawable', context).match(new Circle())).to.be.true;
            expect(new TypeSet('Drawable', context).match(new Shape())).to.be.false;
            expect(new TypeSet('Shape', context).match({})).to.be.false;
        });

        it('check names the expected set and the actual tag', () => {
            expect(() => TypeSet.fromSpec('int', context).check(3.14, 'value')).to.throw(
                TypeMismatchError,
                'Disallowed value type: expected {int}, got float.'
            );
            expect(() => new TypeSet('Circle', context).check(new Shape(), 'key')).to.throw(
                TypeMismatchError,
                'Disallowed key type: expected {Circle}, got Shape.'
            );
        });

        it('carries the mismatch details', () => {
            try {
                new TypeSet('int|bool', context).check('x');
                expect.fail('check should throw');
            } catch (error) {
                expect(error).to.be.instanceOf(TypeMismatchError);
                if (!(error instanceof TypeMismatchError)) return;
                expect(error.label).to.equal('value');
                expect(error.expected).to.deep.equal(['int', 'bool']);
                expect(error.actual).to.equal('string');
            }
        });

        it('integers always match int and never string', () => {
            const ints = new TypeSet('int', context);
            const texts = new TypeSet('string', context);
            fc.assert(fc.property(fc.integer(), (n) => ints.match(n) && !texts.match(n)));
        });

        it('finite doubles always match float', () => {
            const floats = new TypeSet('float', context);
            fc.assert(fc.property(fc.double({noNaN: true}), (x) => floats.match(x)));
        });
    });

    describe('inference', () => {
        it('grows from sample values', () => {
            const types = new TypeSet(null, context);
            types.infer(1).infer('a').infer(2);
            expect(types.containsOnly('int', 'string')).to.be.true;
        });

        it('records the user type name of instances', () => {
            const types = new TypeSet(null, context).addValueType(new Circle());
            expect(types.containsOnly('Circle')).to.be.true;
            expect(types.tagOf(new Circle())).to.equal('Circle');
            expect(types.tagOf({})).to.equal('object');
        });
    });

    describe('defaultValue', () => {
        const defaultOf = (spec: string) => new TypeSet(spec, context).defaultValue();

        it('follows the priority order', () => {
            expect(defaultOf('int|bool|string')).to.equal(false);
            expect(defaultOf('int|string|null')).to.equal(null);
            expect(defaultOf('int|string')).to.equal(0);
            expect(defaultOf('float|string')).to.equal(0);
            expect(defaultOf('string|array')).to.equal('');
            expect(defaultOf('array')).to.deep.equal([]);
            expect(defaultOf('iterable')).to.deep.equal([]);
            expect(defaultOf('object')).to.deep.equal({});
        });

        it('is null for an unconstrained set', () => {
            expect(new TypeSet(null, context).defaultValue()).to.equal(null);
        });

        it('uses the declared factory of a named type', () => {
            const value = defaultOf('Point');
            expect(value).to.be.instanceOf(Point);
            expect(value).to.deep.equal(new Point(0, 0));
        });

        it('fails when no default can be derived', () => {
            for (const spec of ['callable', 'symbol', 'Shape']) {
                expect(() => defaultOf(spec)).to.throw(
                    NoDefaultAvailableError,
                    'No default value could be determined for this TypeSet.'
                );
            }
        });
    });

    it('clone is independent of the original', () => {
        const original = new TypeSet('int', context);
        const copy = original.clone().add('string');
        expect(original.containsOnly('int')).to.be.true;
        expect(copy.containsOnly('int', 'string')).to.be.true;
    });
});
