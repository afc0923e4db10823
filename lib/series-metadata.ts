import { z } from "zod";

/*
 * `series.json` is the series detail record as returned by the Patchwork REST
 * API (`/api/1.1/series/<id>/`). Only the fields used here are validated;
 * everything else is passed through untouched.
 */

export const PatchDetailSchema = z
    .object({
        id: z.number().int().optional(),
        name: z.string(),
        msgid: z.string().nullable().optional(),
        web_url: z.string().nullable().optional(),
        mbox: z.string().nullable().optional(),
    })
    .passthrough();

export const CoverLetterDetailSchema = z
    .object({
        id: z.number().int().optional(),
        name: z.string().nullable().optional(),
        msgid: z.string().nullable().optional(),
        web_url: z.string().nullable().optional(),
    })
    .passthrough();

export const SubmitterSchema = z
    .object({
        name: z.string().nullable().optional(),
        email: z.string(),
    })
    .passthrough();

export const SeriesMetadataSchema = z
    .object({
        id: z.number().int().nonnegative(),
        name: z.string().nullable().optional(),
        web_url: z.string().nullable().optional(),
        submitter: SubmitterSchema.nullable().optional(),
        cover_letter: CoverLetterDetailSchema.nullable().optional(),
        patches: z.array(PatchDetailSchema).default([]),
    })
    .passthrough()
    .transform((series) => ({ ...series, name: series.name || defaultSeriesName(series.id) }));

export type IPatchDetail = z.infer<typeof PatchDetailSchema>;
export type ICoverLetterDetail = z.infer<typeof CoverLetterDetailSchema>;
export type ISeriesMetadata = z.infer<typeof SeriesMetadataSchema>;

export interface ISeriesHandle {
    readonly name: string; // directory name
    readonly path: string;
}

/**
 * A patch series as stored on disk, ready to be applied.
 */
export interface ISeries {
    readonly id: number;
    readonly name: string;
    readonly handle: ISeriesHandle;
    readonly metadata: ISeriesMetadata;
    readonly coverLetterPath?: string;
    readonly patchPaths: string[];
}

export function defaultSeriesName(id: number): string {
    return `Untitled series of #${id}`;
}
