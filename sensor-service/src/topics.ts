// ThingsBoard device API topics (the device is always addressed as "me")
export const TOPICS = {
  telemetry: 'v1/devices/me/telemetry',
  attributes: 'v1/devices/me/attributes',
  attributesRequest: (requestId: number) => `v1/devices/me/attributes/request/${requestId}`,
  attributesResponse: 'v1/devices/me/attributes/response/+',
};

export const ATTRIBUTE_KEYS = ['interval', 'enabled', 'firmware_version'] as const;
export type AttributeKey = (typeof ATTRIBUTE_KEYS)[number];

export function snapshotRequestPayload(): string {
  return JSON.stringify({ sharedKeys: ATTRIBUTE_KEYS.join(',') });
}

// True for the push-update topic and any snapshot response topic.
export function isAttributeTopic(topic: string): boolean {
  if (topic === TOPICS.attributes) return true;
  const parts = topic.split('/');
  return parts.length === 6 && topic.startsWith('v1/devices/me/attributes/response/') && parts[5] !== '';
}
