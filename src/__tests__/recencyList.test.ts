// =============================================================================
// Recency List Tests
// =============================================================================
import { RecencyList } from '../utils/recencyList';

function keysOf(list: RecencyList<string, number>): string[] {
  return Array.from(list, (node) => node.key);
}

describe('RecencyList', () => {
  let list: RecencyList<string, number>;

  beforeEach(() => {
    list = new RecencyList<string, number>();
  });

  it('should start empty', () => {
    expect(list.length).toBe(0);
    expect(keysOf(list)).toEqual([]);
    expect(list.shift()).toBeNull();
  });

  it('should append at the newest end', () => {
    list.append('a', 1);
    list.append('b', 2);
    list.append('c', 3);
    expect(keysOf(list)).toEqual(['a', 'b', 'c']);
    expect(list.length).toBe(3);
  });

  it('should move a middle node to the newest end', () => {
    list.append('a', 1);
    const b = list.append('b', 2);
    list.append('c', 3);

    list.moveToTail(b);
    expect(keysOf(list)).toEqual(['a', 'c', 'b']);
    expect(list.length).toBe(3);
  });

  it('should treat moving the newest node as a no-op', () => {
    list.append('a', 1);
    const b = list.append('b', 2);
    list.moveToTail(b);
    expect(keysOf(list)).toEqual(['a', 'b']);
  });

  it('should move the oldest node and update the head', () => {
    const a = list.append('a', 1);
    list.append('b', 2);
    list.moveToTail(a);
    expect(keysOf(list)).toEqual(['b', 'a']);
    expect(list.shift()?.key).toBe('b');
  });

  it('should shift the oldest node and detach it', () => {
    list.append('a', 1);
    list.append('b', 2);

    const shifted = list.shift();
    expect(shifted?.key).toBe('a');
    expect(shifted?.next).toBeNull();
    expect(keysOf(list)).toEqual(['b']);
    expect(list.shift()?.prev).toBeNull();
  });

  it('should unlink the only node and leave an empty list', () => {
    const only = list.append('a', 1);
    list.unlink(only);
    expect(list.length).toBe(0);
    expect(list.shift()).toBeNull();

    list.append('b', 2);
    expect(keysOf(list)).toEqual(['b']);
  });

  it('should keep walking when the current node is unlinked mid-iteration', () => {
    list.append('a', 1);
    list.append('b', 2);
    list.append('c', 3);

    const seen: string[] = [];
    for (const node of list) {
      seen.push(node.key);
      list.unlink(node);
    }
    expect(seen).toEqual(['a', 'b', 'c']);
    expect(list.length).toBe(0);
  });

  it('clear should drop every node', () => {
    list.append('a', 1);
    list.append('b', 2);
    list.clear();
    expect(list.length).toBe(0);
    expect(keysOf(list)).toEqual([]);
  });
});
