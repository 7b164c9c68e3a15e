/**
 * MorkContext - Dictionaries and tables accumulated by one parse
 *
 * A group is parsed into a child context layered over its parent: lookups fall
 * through to the parent, writes stay in the child until `commit()`.
 */

import { MorkTable, MorkTables } from './types';

export class MorkContext {
  private dictionaries: Map<string, Map<string, string>> = new Map();
  private tables: MorkTables = new Map();
  private readonly parent: MorkContext | null;

  constructor(parent: MorkContext | null = null) {
    this.parent = parent;
  }

  public isGroup(): boolean {
    return this.parent !== null;
  }

  /** The dictionary of this layer for `namespace`, created on first use. */
  public dictionaryFor(namespace: string): Map<string, string> {
    let dictionary = this.dictionaries.get(namespace);
    if (!dictionary) {
      dictionary = new Map();
      this.dictionaries.set(namespace, dictionary);
    }
    return dictionary;
  }

  public define(id: string, namespace: string, value: string): void {
    this.dictionaryFor(namespace).set(id, value);
  }

  public lookup(id: string, namespace: string): string | undefined {
    const value = this.dictionaries.get(namespace)?.get(id);
    if (value !== undefined) {
      return value;
    }
    return this.parent?.lookup(id, namespace);
  }

  public setTable(table: MorkTable): void {
    this.tables.set(table.key, table);
  }

  /** Tables written to this layer, in first-write order. */
  public getTables(): MorkTables {
    return new Map(this.tables);
  }

  public beginGroup(): MorkContext {
    return new MorkContext(this);
  }

  /** Applies this group's writes to the parent as one batch. */
  public commit(): void {
    const parent = this.parent;
    if (!this.isGroup() || !parent) {
      throw new Error('Cannot commit a context that is not a group');
    }
    for (const [namespace, dictionary] of this.dictionaries) {
      const target = parent.dictionaryFor(namespace);
      for (const [id, value] of dictionary) {
        target.set(id, value);
      }
    }
    for (const table of this.tables.values()) {
      parent.setTable(table);
    }
    this.dictionaries = new Map();
    this.tables = new Map();
  }
}
