import { z } from "zod";

export const PanelSourceSchema = z.object({
	path: z.string().min(1),
	/** Column holding the period; falls back to the first column when absent */
	date_column: z.string().min(1).default("day_date"),
	/** Auto-detected when omitted */
	delimiter: z.string().length(1).optional(),
});
export type PanelSource = z.infer<typeof PanelSourceSchema>;

export const DataConfigSchema = z.object({
	factor: PanelSourceSchema,
	returns: PanelSourceSchema,
});
export type DataConfig = z.infer<typeof DataConfigSchema>;

/**
 * A named set of evaluation overrides, deep-merged over the base
 * evaluation config and validated after merging.
 */
export const VariantSchema = z.object({
	name: z.string().min(1),
	overrides: z.record(z.string(), z.unknown()).default({}),
});
export type Variant = z.infer<typeof VariantSchema>;
export type VariantInput = z.input<typeof VariantSchema>;
