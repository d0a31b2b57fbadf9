import { z } from "zod";

export const guestListSchema = z.array(
  z
    .object({
      vmid: z.coerce.number().int().positive().optional()
    })
    .passthrough()
);

// Values are mostly strings and numbers, but raw `lxc` entries come back as nested arrays.
export const containerConfigSchema = z.record(z.string(), z.unknown());

export const agentHostnameSchema = z
  .object({
    result: z
      .object({
        "host-name": z.string().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough()
  .nullable();

export const snapshotTaskSchema = z.string().nullable().optional();

export const taskStatusSchema = z
  .object({
    status: z.string(),
    exitstatus: z.string().optional()
  })
  .passthrough();
