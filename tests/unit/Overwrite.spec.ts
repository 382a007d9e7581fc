import { describe, it } from 'node:test';
import assert from 'node:assert';
import { overwriteInPlace } from '../../libs/secrets/overwrite.js';

describe('overwriteInPlace', () => {
    it('stars strings and nulls other scalars throughout the tree', () => {
        const nested = { list: ['xy', 1, null, false] };
        const tree = { token: 'abc', count: 3, flag: true, nested };

        overwriteInPlace(tree);

        assert.deepStrictEqual(tree, {
            token: '***',
            count: null,
            flag: null,
            nested: { list: ['**', null, null, null] }
        });
    });

    it('keeps container identity so shared references see the wipe', () => {
        const inner = { secret: 'hunter' };
        const tree = { inner, items: [inner] };

        overwriteInPlace(tree);

        assert.strictEqual(tree.inner, inner);
        assert.strictEqual(inner.secret, '******');
    });

    it('walks top-level arrays', () => {
        const list: unknown[] = ['ab', { k: 'v' }, 7];
        overwriteInPlace(list);
        assert.deepStrictEqual(list, ['**', { k: '*' }, null]);
    });

    it('ignores scalars', () => {
        assert.doesNotThrow(() => overwriteInPlace('plain'));
        assert.doesNotThrow(() => overwriteInPlace(null));
    });
});
