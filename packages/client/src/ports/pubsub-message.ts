export type SubscribeConfirmation = {
  kind: "subscribe"
  channel: string
}

export type ChannelMessage = {
  kind: "message"
  channel: string
  payload: string
}

export type PubSubMessage = SubscribeConfirmation | ChannelMessage
