import { z } from "zod";
import { DEFAULT_STATIC_POD_NAMESPACES, TEST_NAME } from "./types.js";

const splitList = (v: string | string[]) =>
  (Array.isArray(v) ? v : v.split(","))
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

export const CheckInputSchema = z.object({
  namespaces: z
    .union([z.string(), z.array(z.string())])
    .default([...DEFAULT_STATIC_POD_NAMESPACES])
    .transform((v) => [...new Set(splitList(v))])
    .pipe(z.array(z.string()).min(1, "at least one namespace is required")),
  kubeconfig: z.string().optional(),
  context: z.string().optional(),
  eventsDir: z.string().optional(), // if set, read saved event dumps instead of calling kubectl
  testName: z.string().min(1).default(TEST_NAME),
  junitPath: z.string().optional(),
  overwriteJunit: z.boolean().default(true),
  requestTimeoutSeconds: z
    .union([z.string(), z.number()])
    .default(120)
    .transform((v) => Number(v))
    .pipe(z.number().int().positive()),
  verbose: z.boolean().default(false),
});

export type CheckInput = z.input<typeof CheckInputSchema>;
export type CheckConfig = z.infer<typeof CheckInputSchema>;
