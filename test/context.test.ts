import { MorkContext } from '../src/context';
import { MorkTable } from '../src/types';

function table(id: string, scope = 'c'): MorkTable {
  return { id, scope, key: `${id}:${scope}`, rowScope: scope, meta: new Map(), rows: new Map() };
}

describe('MorkContext', () => {
  test('should create dictionaries on first use', () => {
    const context = new MorkContext();
    const dictionary = context.dictionaryFor('a');

    dictionary.set('1', 'one');

    expect(context.dictionaryFor('a')).toBe(dictionary);
    expect(context.lookup('1', 'a')).toBe('one');
    expect(context.lookup('1', 'c')).toBeUndefined();
  });

  test('should keep the last value defined for an id', () => {
    const context = new MorkContext();
    context.define('1', 'a', 'first');
    context.define('1', 'a', 'second');

    expect(context.lookup('1', 'a')).toBe('second');
  });

  test('should keep namespaces apart', () => {
    const context = new MorkContext();
    context.define('1', 'a', 'value');

    expect(context.lookup('1', 'c')).toBeUndefined();
  });

  describe('Groups', () => {
    test('should see the parent through a group', () => {
      const root = new MorkContext();
      root.define('1', 'a', 'outer');
      const group = root.beginGroup();
      group.define('2', 'a', 'inner');

      expect(group.isGroup()).toBe(true);
      expect(group.lookup('1', 'a')).toBe('outer');
      expect(group.lookup('2', 'a')).toBe('inner');
      expect(root.lookup('2', 'a')).toBeUndefined();
    });

    test('should shadow parent values inside a group', () => {
      const root = new MorkContext();
      root.define('1', 'a', 'outer');
      const group = root.beginGroup();
      group.define('1', 'a', 'inner');

      expect(group.lookup('1', 'a')).toBe('inner');
      expect(root.lookup('1', 'a')).toBe('outer');
    });

    test('should apply dictionaries and tables on commit', () => {
      const root = new MorkContext();
      root.setTable(table('1'));
      const group = root.beginGroup();
      group.define('9', 'x', 'nine');
      const replacement = table('1');
      replacement.meta.set('k', 'v');
      group.setTable(replacement);
      group.setTable(table('2', 'd'));

      expect(root.getTables().has('2:d')).toBe(false);
      expect(group.getTables().get('1:c')).toBe(replacement);

      group.commit();

      expect(root.lookup('9', 'x')).toBe('nine');
      expect(Array.from(root.getTables().keys())).toEqual(['1:c', '2:d']);
      expect(root.getTables().get('1:c')).toBe(replacement);
      expect(group.getTables().size).toBe(0);
    });

    test('should leave the parent untouched when a group is dropped', () => {
      const root = new MorkContext();
      const group = root.beginGroup();
      group.define('1', 'a', 'discarded');
      group.setTable(table('5'));

      expect(root.lookup('1', 'a')).toBeUndefined();
      expect(root.getTables().size).toBe(0);
    });

    test('should refuse to commit the root context', () => {
      const root = new MorkContext();

      expect(root.isGroup()).toBe(false);
      expect(() => root.commit()).toThrow('Cannot commit a context that is not a group');
    });
  });
});
