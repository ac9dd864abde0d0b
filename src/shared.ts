import { safe } from 'ts-safe';

/**
 * Reserved name of the terminal node.
 * A node registered under this name runs, and execution stops right after it.
 */
export const END = 'END';

export const isNull = (v: unknown): v is undefined | null => {
  return v == undefined;
};

export const randomId = () => {
  return 'graph-xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, function (c) {
    const r = (Math.random() * 16) | 0;
    const v = c === 'x' ? r : (r & 0x3) | 0x8;
    return v.toString(16);
  });
};

export const createPubSub = <E>() => {
  const eventHandlers: Array<(event: E) => void> = [];
  return {
    publish(e: E) {
      // a failing subscriber must not break the invocation it observes
      [...eventHandlers].forEach((handler) => {
        safe(() => handler(e))
          .catch((error) => {
            console.error('Graph event handler failed', error);
          })
          .unwrap();
      });
    },
    subscribe(handler: (event: E) => void) {
      eventHandlers.push(handler);
    },
    unsubscribe(handler: (event: E) => void) {
      const index = eventHandlers.findIndex((v) => v === handler);
      if (index !== -1) eventHandlers.splice(index, 1);
    },
  };
};
