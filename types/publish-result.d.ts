/** Outcome of the tag, push and release sequence. */
export type PublishResult =
  | {
      release: 'existing' | 'created'
      tag: 'existing' | 'created'
      assetUploaded: boolean
      status: 'published'
      version: string
    }
  | {
      status: 'skipped'
      reason: string
    }
