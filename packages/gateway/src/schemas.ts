import { z } from "zod";
import { DEFAULT_SESSION_TITLE, type JsonObject, type JsonValue } from "@chatsync/core";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

/** Opaque side-channel payload; anything that is not an object is dropped. */
const metadataSchema = z
  .unknown()
  .transform((value) => {
    const parsed = jsonObjectSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
  });

const successStatus = z.literal("success");

export const RemoteSessionSchema = z.object({
  id: z.number().int().positive(),
  title: z
    .string()
    .nullish()
    .transform((title) => title ?? DEFAULT_SESSION_TITLE),
  created_at: z
    .string()
    .nullish()
    .transform((createdAt) => createdAt ?? ""),
});

export const SessionListResponseSchema = z.object({
  status: successStatus,
  sessions: z.array(RemoteSessionSchema),
});

export const RemoteMessageRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  user_message: z.string(),
  assistant_response: z.string(),
  timestamp: z.string(),
  metadata: metadataSchema,
});

export const MessageListResponseSchema = z.object({
  status: successStatus,
  messages: z.array(RemoteMessageRecordSchema),
});

export const ProcessResponseSchema = z.object({
  status: successStatus.optional(),
  session_id: z.number().int().positive().nullish(),
  response: z.string(),
  metadata: metadataSchema,
});

/** The status field every endpoint may carry; anything but "success" is a soft failure. */
export const StatusEnvelopeSchema = z.object({
  status: z.string().optional(),
});
