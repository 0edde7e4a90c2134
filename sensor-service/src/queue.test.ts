import { AsyncQueue } from './queue.js';

describe('queue', () => {
  describe('AsyncQueue', () => {
    it('should deliver buffered items in push order', async () => {
      const queue = new AsyncQueue<string>();
      queue.push('a');
      queue.push('b');
      expect(queue.size).toBe(2);
      expect(await queue.next()).toEqual({ value: 'a', done: false });
      expect(await queue.next()).toEqual({ value: 'b', done: false });
    });

    it('should wake a waiting consumer on push', async () => {
      const queue = new AsyncQueue<number>();
      const pending = queue.next();
      queue.push(7);
      expect(await pending).toEqual({ value: 7, done: false });
      expect(queue.size).toBe(0);
    });

    it('should drain remaining items before finishing after close', async () => {
      const queue = new AsyncQueue<number>();
      queue.push(1);
      queue.push(2);
      queue.close();
      queue.push(3);

      const seen: number[] = [];
      for await (const item of queue) seen.push(item);
      expect(seen).toEqual([1, 2]);
      expect(queue.isClosed).toBe(true);
    });

    it('should release waiting consumers on close', async () => {
      const queue = new AsyncQueue<number>();
      const pending = queue.next();
      queue.close();
      expect(await pending).toEqual({ value: undefined, done: true });
    });
  });
});
