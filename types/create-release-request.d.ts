/** Validated payload of `POST /repos/{owner}/{repo}/releases`. */
export interface CreateReleaseRequest {
  target_commitish: string
  prerelease: false
  tag_name: string
  draft: false
  name: string
  body: string
}
