/**
 * Configuration schema (Zod)
 */

import { z } from "zod";

export const configSchema = z
  .object({
    /** NetworkManager CLI binary */
    nmcli: z.string().min(1).default("nmcli"),
    /** Prefix mutating nmcli calls with the elevation command */
    sudo: z.boolean().default(true),
    sudoCommand: z.string().min(1).default("sudo"),
    /** Command (plus args) whose output is shown under "System DNS configuration" */
    resolverStatus: z
      .array(z.string().min(1))
      .min(1)
      .default(["resolvectl", "status"]),
    /**
     * Reject DNS values that are not IPv4/IPv6 literals before calling nmcli.
     * Off by default: custom entries reach nmcli verbatim.
     */
    validateAddresses: z.boolean().default(false),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

export function defaultConfig(): Config {
  return configSchema.parse({});
}
