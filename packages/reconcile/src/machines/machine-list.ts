/**
 * Machine List
 *
 * Ordered list of records waiting to be delivered, with a selection set
 * and column sorting.
 */

import type { EnrollmentRecord, MachineSortKey, SortOrder } from '@mac-enroll/core';

const caseInsensitive = (a: string, b: string): number =>
  a.localeCompare(b, undefined, { sensitivity: 'accent' });

const plain = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const COMPARATORS: Record<MachineSortKey, (a: EnrollmentRecord, b: EnrollmentRecord) => number> = {
  friendlyName: (a, b) => caseInsensitive(a.friendlyName, b.friendlyName),
  endUserName: (a, b) => caseInsensitive(a.endUserName, b.endUserName),
  assetNumber: (a, b) => caseInsensitive(a.assetNumber, b.assetNumber),
  locationGroupId: (a, b) => plain(a.locationGroupId, b.locationGroupId),
  serialNumber: (a, b) => caseInsensitive(a.serialNumber, b.serialNumber),
};

export class MachineList {
  private records: EnrollmentRecord[] = [];
  private readonly selected = new Set<string>();
  private sortKey: MachineSortKey | null = null;
  private order: SortOrder = 'ascending';

  constructor(initial: Iterable<EnrollmentRecord> = []) {
    this.addMany(initial);
  }

  get size(): number {
    return this.records.length;
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  /** Current sort column and direction, if any */
  get sorting(): { key: MachineSortKey; order: SortOrder } | null {
    return this.sortKey ? { key: this.sortKey, order: this.order } : null;
  }

  toArray(): EnrollmentRecord[] {
    return [...this.records];
  }

  get(id: string): EnrollmentRecord | undefined {
    return this.records.find((r) => r.id === id);
  }

  add(record: EnrollmentRecord): void {
    this.records.push(record);
  }

  addMany(records: Iterable<EnrollmentRecord>): void {
    for (const record of records) {
      this.records.push(record);
    }
  }

  /** Remove one record by id; false if it was not listed */
  remove(id: string): boolean {
    const before = this.records.length;
    this.records = this.records.filter((r) => r.id !== id);
    this.selected.delete(id);
    return this.records.length !== before;
  }

  /** Remove records at list positions; out-of-range positions are ignored */
  removeAt(indices: Iterable<number>): EnrollmentRecord[] {
    const doomed = new Set(indices);
    const removed: EnrollmentRecord[] = [];
    this.records = this.records.filter((record, i) => {
      if (!doomed.has(i)) return true;
      removed.push(record);
      this.selected.delete(record.id);
      return false;
    });
    return removed;
  }

  get selection(): string[] {
    return [...this.selected];
  }

  select(id: string): void {
    if (this.get(id)) {
      this.selected.add(id);
    }
  }

  deselect(id: string): void {
    this.selected.delete(id);
  }

  clearSelection(): void {
    this.selected.clear();
  }

  /** Remove every selected record and clear the selection */
  removeSelected(): number {
    const before = this.records.length;
    this.records = this.records.filter((r) => !this.selected.has(r.id));
    this.selected.clear();
    return before - this.records.length;
  }

  removeAll(): number {
    const count = this.records.length;
    this.records = [];
    this.selected.clear();
    return count;
  }

  /** Keep only the given ids, in their current order */
  retainOnly(ids: Iterable<string>): void {
    const keep = new Set(ids);
    this.records = this.records.filter((r) => keep.has(r.id));
    for (const id of [...this.selected]) {
      if (!keep.has(id)) this.selected.delete(id);
    }
  }

  /**
   * Sort by a column. Sorting the current column again flips the direction;
   * a new column starts ascending.
   */
  sortBy(key: MachineSortKey): SortOrder {
    if (this.sortKey === key) {
      this.order = this.order === 'ascending' ? 'descending' : 'ascending';
    } else {
      this.sortKey = key;
      this.order = 'ascending';
    }

    const compare = COMPARATORS[key];
    const direction = this.order === 'ascending' ? 1 : -1;
    this.records.sort((a, b) => direction * compare(a, b));
    return this.order;
  }
}
