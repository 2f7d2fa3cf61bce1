/** JSON body sent to a Slack incoming webhook. */
export interface SlackPayload {
  icon_emoji: string
  username: string
  text: string
}
