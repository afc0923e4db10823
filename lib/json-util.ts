import stringify from "json-stable-stringify";
import { ZodType, ZodTypeDef } from "zod";

/**
 * Parse JSON and validate it against a schema.
 *
 * @throws {Error} if the input is not JSON or does not match the schema
 */
export function fromJSON<T>(input: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
    return schema.parse(JSON.parse(input));
}

export function toPrettyJSON<T>(input: T): string {
    const result = stringify(input, { space: 4 });
    if (typeof result !== "string") throw new Error(`Could not convert ${String(input)} to JSON`);
    return result;
}
