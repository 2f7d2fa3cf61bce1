/** Local Git tag with the commit time of the commit it points to. */
export interface GitTagEntry {
  /** Commit time in seconds since the epoch. */
  createdAt: number

  /** Tag name (e.g. `v1.2.3`). */
  name: string
}
