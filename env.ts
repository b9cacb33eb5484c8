import { config } from "dotenv";
import { z } from "zod";

// Load environment variables from .env file
config();

const zBooleanString = z
  .enum(["true", "false"])
  .optional()
  .transform((v) => v === "true");

const ZEnvSchema = z.object({
  FORKLINE_SAVE_DIR: z.string().optional(),
  FORKLINE_VERBOSE: zBooleanString,
  FORKLINE_FAST: zBooleanString,
});

export type Env = z.infer<typeof ZEnvSchema>;

export const loadEnv = (): Env => {
  try {
    return ZEnvSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalidVars = error.errors
        .map((err) => err.path.join("."))
        .join(", ");
      throw new Error(`Missing or invalid environment variables: ${invalidVars}`);
    }
    throw error;
  }
};
