import { z } from "zod";

function requiredText(field: string) {
  return z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .trim()
    .min(1, `${field} is required`);
}

// Owner and repository names as the platform allows them
const REPO_SEGMENT_REGEX = /^[A-Za-z0-9_.-]+$/;

function repoSegment(field: string) {
  return requiredText(field)
    .max(100, `${field} must be 100 characters or less`)
    .regex(
      REPO_SEGMENT_REGEX,
      `${field} may only contain letters, digits, '-', '_' and '.'`
    );
}

/**
 * Body shared by every tenant-scoped request. Numeric user ids are taken
 * as their decimal string.
 */
export const tenantRequestSchema = z.object({
  repo_owner: repoSegment("repo_owner"),
  repo_name: repoSegment("repo_name"),
  user_id: z.preprocess(
    (value) => (typeof value === "number" ? String(value) : value),
    requiredText("user_id")
  ),
});

/**
 * Records are validated one by one by the command validator so that a bad
 * record fails only its own step; here they only have to be an array.
 */
export const executeRequestSchema = tenantRequestSchema.extend({
  commands: z.array(z.unknown(), {
    required_error: "commands is required",
    invalid_type_error: "commands must be an array",
  }),
});

export type TenantRequest = z.infer<typeof tenantRequestSchema>;
export type ExecuteRequest = z.infer<typeof executeRequestSchema>;
