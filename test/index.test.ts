import { expect } from 'chai';
import { Bag, bagOf, defaultMinter, emptyBag, fromIterable } from '../src/index';

describe('factories', () => {
    it('emptyBag creates an empty bag', () => {
        const bag = emptyBag<string>();
        expect(bag).to.be.instanceOf(Bag);
        expect(bag.isEmpty()).to.be.true;
    });

    it('bagOf returns one token per value, in order', () => {
        const { bag, tokens } = bagOf('a', 'b', 'a');

        expect([...bag]).to.deep.equal(['a', 'b', 'a']);
        expect(tokens).to.have.length(3);

        bag.remove(tokens[0]);
        expect([...bag]).to.deep.equal(['b', 'a']);
    });

    it('bagOf mints with the shared default minter', () => {
        const { tokens } = bagOf(1, 2);
        expect(tokens.map(token => token.minter)).to.deep.equal([defaultMinter, defaultMinter]);
    });

    it('fromIterable drains any iterable and passes options through', () => {
        const source = new Set([1, 2, 3]).values();
        const { bag, tokens } = fromIterable(source, { recentWindow: 0 });

        expect(bag.toArray()).to.deep.equal([1, 2, 3]);
        expect(bag.remove(tokens[1])).to.be.true;
        expect(bag.toArray()).to.deep.equal([1, 3]);
    });
});
