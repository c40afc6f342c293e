/** One slice of a dataset processed as a unit. */
export interface Partition<T> {
  readonly partitionIndex: number;
  readonly items: readonly T[];
}

/**
 * Domain service that groups rows into fixed-size partitions.
 *
 * Pure logic, no I/O. The final partition may hold fewer than `partitionSize` rows.
 */
export class Partitioner {
  constructor(private readonly partitionSize: number) {
    if (!Number.isInteger(partitionSize) || partitionSize < 1) {
      throw new Error('Partition size must be a positive integer');
    }
  }

  split<T>(items: readonly T[]): Partition<T>[] {
    const partitions: Partition<T>[] = [];
    for (let start = 0; start < items.length; start += this.partitionSize) {
      partitions.push({
        partitionIndex: partitions.length,
        items: items.slice(start, start + this.partitionSize),
      });
    }
    return partitions;
  }
}
