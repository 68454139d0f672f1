import { ValidationMode, ViolationAction } from "@bitgrid/types";
import { z } from "zod";

export const BitLengthSchema = z
	.number()
	.int("Bit length must be an integer")
	.nonnegative("Bit length must not be negative")
	.max(Number.MAX_SAFE_INTEGER, "Bit length must be a safe integer");

export const GroupSizeSchema = z.number().int("Group size must be an integer").positive("Group size must be positive");

export const CoordinatesSchema = z
	.object({
		dims: z.array(z.number().int().positive("Dimensions must be positive")),
		indices: z.array(z.number().int().nonnegative("Indices must not be negative")),
	})
	.superRefine(({ dims, indices }, ctx) => {
		if (dims.length !== indices.length) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Expected ${dims.length} indices, got ${indices.length}`,
				path: ["indices"],
			});
			return;
		}
		indices.forEach((index, i) => {
			if (index >= dims[i]) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Index ${index} out of bounds for dimension ${i} of size ${dims[i]}`,
					path: ["indices", i],
				});
			}
		});
	});

const LogLevelSchema = z.preprocess(
	(value) => (typeof value === "string" ? value.toLowerCase() : value),
	z.enum(["trace", "debug", "info", "warn", "error", "silent"])
);

export const BitVectorConfigSchema = z.object({
	mode: z.nativeEnum(ValidationMode).optional(),
	on_violation: z.nativeEnum(ViolationAction).optional(),
	log_config: z
		.object({
			level: LogLevelSchema.optional(),
			template: z.string().optional(),
		})
		.optional(),
});
