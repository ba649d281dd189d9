/**
 * Response Schema
 *
 * Output shape the summarizer must follow, in Gemini's OpenAPI schema subset.
 */

export const SUMMARY_RESPONSE_SCHEMA = {
  type: 'OBJECT',
  properties: {
    summary_parts: {
      type: 'ARRAY',
      items: {
        type: 'OBJECT',
        properties: {
          type: { type: 'STRING', enum: ['text', 'key_message', 'media'] },
          content: { type: 'STRING' },
          author: { type: 'STRING' },
          filename: { type: 'STRING' }
        },
        required: ['type']
      }
    },
    bullet_points: {
      type: 'ARRAY',
      items: { type: 'STRING' }
    },
    sentiments: {
      type: 'ARRAY',
      items: {
        type: 'OBJECT',
        properties: {
          sentiment: { type: 'STRING' },
          count: { type: 'INTEGER' }
        },
        required: ['sentiment', 'count']
      }
    }
  },
  required: ['summary_parts', 'bullet_points']
} as const

/** Compact description of the shape, repeated in the prompt text */
export const RESPONSE_SHAPE_TEXT =
  '{ "summary_parts": [{ "type": "text" | "key_message" | "media", "content"?: string, "author"?: string, "filename"?: string }], "bullet_points": [string], "sentiments"?: [{ "sentiment": string, "count": number }] }'
