import { getItemLabel, runWithItemLabel } from './context';

describe('item context', () => {
    it('should expose the label across awaits inside the callback', async () => {
        const seen = await runWithItemLabel('3/12', async () => {
            await Promise.resolve();
            return getItemLabel();
        });

        expect(seen).toBe('3/12');
    });

    it('should have no label outside a labelled run', () => {
        expect(getItemLabel()).toBeUndefined();
    });
});
