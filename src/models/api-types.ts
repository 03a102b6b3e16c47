import { z } from 'zod';

// ============================================================================
// Inbound HTTP
// ============================================================================

export const ChatRequestSchema = z.object({
  message: z.string().describe('Student question')
});

export interface ChatResponse {
  response: string;
}

// ============================================================================
// Gemini REST payloads
// ============================================================================

/**
 * `models/{model}:embedContent` response
 */
export const EmbedContentResponseSchema = z.object({
  embedding: z.object({
    values: z.array(z.number())
  })
});

/**
 * One entry of the `models` listing
 */
export const ModelInfoSchema = z.object({
  name: z.string().min(1).describe('Resource name, "models/<id>"'),
  displayName: z.string().optional(),
  version: z.string().optional(),
  supportedGenerationMethods: z.array(z.string()).default([])
});

export type ModelInfo = z.infer<typeof ModelInfoSchema>;

/**
 * `models` list response (one page)
 */
export const ListModelsResponseSchema = z.object({
  models: z.array(ModelInfoSchema).default([]),
  nextPageToken: z.string().optional()
});
