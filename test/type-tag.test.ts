import { expect } from 'chai';
import { basicTagOf, canonicalTag, isIterable, isPseudoTag, matchesBuiltin, TypeTag } from '../src/type-tag';
import { InvalidTypeNameError } from '../src/errors';

describe('canonicalTag', () => {
    it('keeps builtin names', () => {
        expect(canonicalTag('int')).to.equal(TypeTag.Int);
        expect(canonicalTag('mixed')).to.equal(TypeTag.Anything);
    });

    it('trims and resolves aliases', () => {
        expect(canonicalTag('  integer ')).to.equal('int');
        expect(canonicalTag('boolean')).to.equal('bool');
        expect(canonicalTag('double')).to.equal('float');
        expect(canonicalTag('function')).to.equal('callable');
        expect(canonicalTag('any')).to.equal('mixed');
    });

    it('accepts named types, with or without a leading separator', () => {
        expect(canonicalTag('Point')).to.equal('Point');
        expect(canonicalTag('geometry.Point')).to.equal('geometry.Point');
        expect(canonicalTag('\\Point')).to.equal('Point');
    });

    it('is case-sensitive for builtin names', () => {
        expect(canonicalTag('Int')).to.equal('Int');
    });

    it('rejects malformed names', () => {
        expect(() => canonicalTag('1abc')).to.throw(InvalidTypeNameError, "Invalid type name: '1abc'.");
        expect(() => canonicalTag('a b')).to.throw(InvalidTypeNameError);
        expect(() => canonicalTag('geometry..Point')).to.throw(InvalidTypeNameError);
    });
});

it('basicTagOf reports the concrete tag of every kind', () => {
    expect(basicTagOf(null)).to.equal('null');
    expect(basicTagOf(undefined)).to.equal('null');
    expect(basicTagOf(true)).to.equal('bool');
    expect(basicTagOf(1)).to.equal('int');
    expect(basicTagOf(10n)).to.equal('int');
    expect(basicTagOf(1.5)).to.equal('float');
    expect(basicTagOf('a')).to.equal('string');
    expect(basicTagOf([])).to.equal('array');
    expect(basicTagOf({})).to.equal('object');
    expect(basicTagOf(new Date(0))).to.equal('object');
    expect(basicTagOf(Symbol('s'))).to.equal('symbol');
    expect(basicTagOf(() => 1)).to.equal('callable');
});

it('isPseudoTag only knows the category tags', () => {
    expect(['scalar', 'number', 'iterable', 'mixed'].every(isPseudoTag)).to.be.true;
    expect(isPseudoTag('int')).to.be.false;
});

it('isIterable excludes strings', () => {
    expect(isIterable([1])).to.be.true;
    expect(isIterable(new Set())).to.be.true;
    expect(isIterable('abc')).to.be.false;
    expect(isIterable({})).to.be.false;
});

it('matchesBuiltin expands pseudo-tags', () => {
    expect(matchesBuiltin('int', 1)).to.be.true;
    expect(matchesBuiltin('int', 1.5)).to.be.false;
    expect(matchesBuiltin('float', 1)).to.be.true;
    expect(matchesBuiltin('scalar', 's')).to.be.true;
    expect(matchesBuiltin('scalar', [])).to.be.false;
    expect(matchesBuiltin('number', 2n)).to.be.true;
    expect(matchesBuiltin('iterable', new Map())).to.be.true;
    expect(matchesBuiltin('object', [])).to.be.false;
    expect(matchesBuiltin('null', undefined)).to.be.true;
    expect(matchesBuiltin('mixed', undefined)).to.be.true;
});
