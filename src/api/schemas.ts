// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Response records for the admin and agent services.
 *
 * Every response body is decoded here, at the client boundary, so command
 * and rendering code works with typed fields. Field names follow the wire
 * format (snake_case) of the services.
 */

import { z } from 'zod';

/** Identifiers arrive as strings or numbers depending on the backend store */
const idSchema = z.union([z.string(), z.number()]).transform(String);

// ============================================================================
// Admin service
// ============================================================================

export const userRecordSchema = z.object({
  user_id: idSchema,
  email: z.string(),
  name: z.string(),
  token_valid: z.boolean().default(false),
  token_expires: z.string().nullish(),
  history_count: z.number().int().default(0),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});
export type UserRecord = z.infer<typeof userRecordSchema>;

export const createdUserSchema = z.object({
  user_id: idSchema,
  email: z.string(),
  name: z.string(),
  token: z.string(),
  expires_at: z.string(),
});
export type CreatedUser = z.infer<typeof createdUserSchema>;

export const tokenValidationSchema = z.object({
  valid: z.boolean(),
  user: z
    .object({
      name: z.string().nullish(),
      email: z.string().nullish(),
      token_expires: z.string().nullish(),
    })
    .nullish(),
});
export type TokenValidation = z.infer<typeof tokenValidationSchema>;

export const refreshedTokenSchema = z.object({
  new_token: z.string(),
  expires_at: z.string(),
});
export type RefreshedToken = z.infer<typeof refreshedTokenSchema>;

export const qaAddedSchema = z.object({
  total_history_items: z.number().int(),
});
export type QaAdded = z.infer<typeof qaAddedSchema>;

export const qaEntrySchema = z.object({
  question: z.string().default(''),
  answer: z.string().default(''),
  /** Usually an ISO-8601 string, but left open: older records carry other shapes */
  timestamp: z.unknown(),
});
export type QaEntry = z.infer<typeof qaEntrySchema>;

export const userHistorySchema = z.object({
  history: z.array(qaEntrySchema),
  total_count: z.number().int().optional(),
});
export type UserHistory = z.infer<typeof userHistorySchema>;

export const deletedUserSchema = z
  .object({
    deleted_user: z
      .object({
        name: z.string().nullish(),
        email: z.string().nullish(),
      })
      .optional(),
  })
  .nullable();
export type DeletedUser = z.infer<typeof deletedUserSchema>;

const usersPageSchema = z.object({
  users: z.array(userRecordSchema),
  total: z.number().int().optional(),
});

/**
 * The list endpoint's shape is not pinned down; a recognizable page of users
 * is decoded, anything else is kept raw for display.
 */
export type UserList =
  | { kind: 'page'; users: UserRecord[]; total?: number }
  | { kind: 'raw'; value: unknown };

export const userListSchema = z.unknown().transform((value): UserList => {
  const page = usersPageSchema.safeParse(value);
  if (page.success) {
    return { kind: 'page', users: page.data.users, total: page.data.total };
  }
  const bare = z.array(userRecordSchema).safeParse(value);
  if (bare.success) {
    return { kind: 'page', users: bare.data };
  }
  return { kind: 'raw', value };
});

// ============================================================================
// Agent service
// ============================================================================

export const agentAnswerSchema = z.object({
  answer: z.string().default('No answer received'),
  doc_id: idSchema.nullish(),
  session_id: z.string().nullish(),
});
export type AgentAnswer = z.infer<typeof agentAnswerSchema>;

export const documentEntrySchema = z.object({
  id: idSchema.default('Unknown'),
  filename: z.string().default('Unknown'),
});
export type DocumentEntry = z.infer<typeof documentEntrySchema>;

export const documentListSchema = z
  .object({ documents: z.array(documentEntrySchema).nullish() })
  .nullable()
  .transform((body): DocumentEntry[] => body?.documents ?? []);

export const uploadReceiptSchema = z.object({
  file_path: z.string().default('Unknown'),
  status: z.string().default('Unknown'),
});
export type UploadReceipt = z.infer<typeof uploadReceiptSchema>;

export const documentDeletedSchema = z
  .object({ status: z.string().optional() })
  .nullable()
  .transform((body): string => body?.status ?? 'completed');

export const documentSummarySchema = z.object({
  summary: z.string().default('No summary available'),
});
export type DocumentSummary = z.infer<typeof documentSummarySchema>;

export const documentTopicsSchema = z.object({
  topics: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
});
export type DocumentTopics = z.infer<typeof documentTopicsSchema>;

/** Health responses are only checked for their status code */
export const anyBodySchema = z.unknown();
