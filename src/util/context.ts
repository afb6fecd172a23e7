import { AsyncLocalStorage } from 'async_hooks';

interface ItemContext {
    itemLabel?: string;
}

const itemContext = new AsyncLocalStorage<ItemContext>();

export function getItemLabel(): string | undefined {
    const store = itemContext.getStore();
    return store?.itemLabel;
}

export function runWithItemLabel<T>(itemLabel: string, callback: () => T): T {
    return itemContext.run({ itemLabel }, callback);
}
