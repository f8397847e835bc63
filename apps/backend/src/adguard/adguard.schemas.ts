import { z } from "zod";

/*
 * Wire shapes of the AdGuard Home control API. Everything coming back from
 * upstream goes through these schemas before it reaches the rest of the app.
 */

const matchedRuleSchema = z.object({
  text: z.string(),
  filter_list_id: z.number().int().nullish(),
});

const checkHostFields = {
  rule: z.string().nullish(),
  filter_id: z.number().int().nullish(),
  rules: z.array(matchedRuleSchema).nullish(),
};

export const checkHostResponseSchema = z.discriminatedUnion("reason", [
  z.object({
    reason: z.enum([
      "NotFilteredNotFound",
      "NotFilteredWhiteList",
      "NotFilteredError",
    ]),
    ...checkHostFields,
  }),
  z.object({
    reason: z.enum([
      "FilteredBlackList",
      "FilteredSafeBrowsing",
      "FilteredParental",
      "FilteredInvalid",
      "FilteredSafeSearch",
    ]),
    ...checkHostFields,
  }),
  z.object({
    reason: z.literal("FilteredBlockedService"),
    ...checkHostFields,
    service_name: z.string().nullish(),
  }),
  z.object({
    reason: z.enum(["Rewrite", "RewriteEtcHosts", "RewriteRule"]),
    ...checkHostFields,
    cname: z.string().nullish(),
    ip_addrs: z.array(z.string()).nullish(),
  }),
]);

export type CheckHostResponse = z.infer<typeof checkHostResponseSchema>;

const filterSchema = z.object({
  enabled: z.boolean(),
  id: z.number().int(),
  name: z.string(),
  rules_count: z.number().int(),
  url: z.string(),
  last_updated: z.string().nullish(),
});

export type FilterResponse = z.infer<typeof filterSchema>;

export const filterStatusResponseSchema = z.object({
  enabled: z.boolean(),
  interval: z.number().int().nullish(),
  filters: z.array(filterSchema).nullish(),
  whitelist_filters: z.array(filterSchema).nullish(),
  user_rules: z.array(z.string()).nullish(),
});

export type FilterStatusResponse = z.infer<typeof filterStatusResponseSchema>;

/** Short, single-line summary of the first few validation issues. */
export function describeIssues(error: z.ZodError, limit = 3): string {
  return error.issues
    .slice(0, limit)
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
