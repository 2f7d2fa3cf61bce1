import type { SlackPayload } from '../../types/slack-payload'

import { describeError } from '../errors/describe-error'
import { ReleaseError } from '../errors/release-error'

/**
 * Post a message to a Slack incoming webhook.
 *
 * @param webhook - Webhook URL.
 * @param payload - Message payload.
 */
export async function sendSlackNotification(
  webhook: string,
  payload: SlackPayload,
): Promise<void> {
  let response: Response
  try {
    response = await fetch(webhook, {
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      method: 'POST',
    })
  } catch (error) {
    throw new ReleaseError(
      'SlackNotificationFailed',
      `Error sending message: ${describeError(error)}`,
      { cause: error },
    )
  }

  if (response.status !== 200) {
    let body = await response.text()
    throw new ReleaseError(
      'SlackNotificationFailed',
      `Error sending message: ${response.status}, ${body}`,
    )
  }
}
