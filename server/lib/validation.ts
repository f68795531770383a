import { READ_STATUSES } from "@server/db/schema";
import { toIsbn13 } from "@server/lib/isbn";
import { isNaiveDatetime } from "@server/lib/micropub-request";
import { z } from "zod";

export type FormFields = Record<string, string>;

export const NEW_POST_FIELDS = [
  "read_status",
  "title",
  "authors",
  "switch-uid",
  "doi",
  "isbn",
  "category",
  "visibility",
  "published",
  "tz_offset",
] as const;

export const DELETE_POST_FIELDS = ["confirm_delete", "mp_delete", "id"] as const;

const READ_STATUS_MESSAGE = "Please select the Read Status";
const TITLE_MESSAGE = "Please enter the Title";

// Object schemas report an issue per failing field, so every message is
// collected in a single pass.
export const newPostSchema = z.object({
  read_status: z.enum(READ_STATUSES, {
    errorMap: () => ({ message: READ_STATUS_MESSAGE }),
  }),
  title: z
    .string({ required_error: TITLE_MESSAGE })
    .trim()
    .min(1, TITLE_MESSAGE),
  authors: z.string().trim().default(""),
  "switch-uid": z.string().optional(),
  doi: z.string().trim().default(""),
  isbn: z
    .string()
    .trim()
    .default("")
    .refine(
      (value) => value === "" || toIsbn13(value, true) !== null,
      "The ISBN entered appears to be invalid",
    ),
  category: z.string().default(""),
  visibility: z.string().trim().default(""),
  published: z
    .string()
    .trim()
    .default("")
    .refine(
      (value) => value === "" || isNaiveDatetime(value),
      "The Published datetime appears to be invalid",
    ),
  tz_offset: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) || 0 : 0)),
});

export type NewPostInput = z.infer<typeof newPostSchema>;

export const deletePostSchema = z.object({
  confirm_delete: z.literal("yes", {
    errorMap: () => ({ message: "Please check the box to confirm deletion" }),
  }),
  mp_delete: z.string().optional(),
  id: z.string().optional(),
});

/**
 * Strict allow-list check: false when the form carries any field that is not
 * listed. Values are not inspected.
 */
export function validatePostRequest(
  data: FormFields,
  allowedFields: readonly string[] = NEW_POST_FIELDS,
): boolean {
  return Object.keys(data).every((key) => allowedFields.includes(key));
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

export function parseNewPost(data: FormFields): ParseResult<NewPostInput> {
  const result = newPostSchema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => issue.message),
    };
  }
  return { success: true, data: result.data };
}

export function validateNewPost(data: FormFields): string[] {
  const result = parseNewPost(data);
  return result.success ? [] : result.errors;
}

export function validateDeletePost(data: FormFields): string[] {
  const result = deletePostSchema.safeParse(data);
  return result.success
    ? []
    : result.error.issues.map((issue) => issue.message);
}
