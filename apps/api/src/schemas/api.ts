/**
 * API Schemas with Zod validation
 *
 * Request/response shapes for the HTTP endpoints
 */

import { z } from 'zod';

export const RecommendRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(5000, 'Query too long'),
  top_k: z.number().int('top_k must be an integer').min(1, 'top_k must be at least 1').optional(),
});

export const AssessmentRecommendationSchema = z.object({
  assessment_name: z.string(),
  assessment_url: z.string(),
  test_type: z.string(),
  description: z.string(),
});

export const RecommendResponseSchema = z.object({
  recommendations: z.array(AssessmentRecommendationSchema),
  query: z.string(),
  count: z.number(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  details: z.array(z.object({ path: z.string(), message: z.string() })).optional(),
});

export type RecommendRequest = z.infer<typeof RecommendRequestSchema>;
export type AssessmentRecommendation = z.infer<typeof AssessmentRecommendationSchema>;
export type RecommendResponse = z.infer<typeof RecommendResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
