import path from 'path';
import { getConfig } from '../config.js';
import { createErrorResponse, errorToResponse } from '../error-handlers.js';
import {
    extractData,
    fillFields,
    fillTableRows,
    findPlaceholdersInTree,
    insertPlaceholders,
    pack,
    readFieldMapping,
    renameExtracted,
    SofficeValidator,
    toPlaceholderList,
    unpack,
    verifyFill,
    writePlaceholderList,
} from '../tools/docx/index.js';
import { DocxErrorCode } from '../tools/docx/errors.js';
import { isDocxPath } from '../tools/docx/utils/paths.js';
import {
    ExtractDataArgsSchema,
    FillFieldsArgsSchema,
    FillTableArgsSchema,
    FindPlaceholdersArgsSchema,
    InsertPlaceholdersArgsSchema,
    PackDocxArgsSchema,
    UnpackDocxArgsSchema,
    VerifyFillArgsSchema,
} from '../tools/schemas.js';
import type { ServerResult } from '../types.js';

function jsonResponse(payload: unknown): ServerResult {
    return {
        content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    };
}

/**
 * Handle unpack_docx command
 */
export async function handleUnpackDocx(args: unknown): Promise<ServerResult> {
    try {
        const parsed = UnpackDocxArgsSchema.parse(args ?? {});
        const result = await unpack(path.resolve(parsed.archivePath), path.resolve(parsed.destinationDir));
        return jsonResponse(result);
    } catch (error) {
        return errorToResponse(error, 'unpack_docx');
    }
}

/**
 * Handle find_placeholders command
 */
export async function handleFindPlaceholders(args: unknown): Promise<ServerResult> {
    try {
        const parsed = FindPlaceholdersArgsSchema.parse(args ?? {});
        const includeHeadersFooters = parsed.includeHeadersFooters ?? getConfig().includeHeadersFooters;
        const names = await findPlaceholdersInTree(path.resolve(parsed.directory), { includeHeadersFooters });

        if (parsed.outputFile) {
            const list = await writePlaceholderList(path.resolve(parsed.outputFile), names);
            return jsonResponse({ ...list, outputFile: path.resolve(parsed.outputFile) });
        }
        return jsonResponse(toPlaceholderList(names));
    } catch (error) {
        return errorToResponse(error, 'find_placeholders');
    }
}

/**
 * Handle fill_fields command.  An inline mapping wins over a mapping file.
 */
export async function handleFillFields(args: unknown): Promise<ServerResult> {
    try {
        const parsed = FillFieldsArgsSchema.parse(args ?? {});
        const mapping =
            parsed.fieldMapping ?? (parsed.mappingFile ? await readFieldMapping(path.resolve(parsed.mappingFile)) : {});
        const includeHeadersFooters = parsed.includeHeadersFooters ?? getConfig().includeHeadersFooters;

        const result = await fillFields(path.resolve(parsed.directory), mapping, { includeHeadersFooters });
        return jsonResponse({
            ...result,
            summary: `Filled ${result.filled.length} field(s), skipped ${result.skipped.length}`,
        });
    } catch (error) {
        return errorToResponse(error, 'fill_fields');
    }
}

/**
 * Handle fill_table command
 */
export async function handleFillTable(args: unknown): Promise<ServerResult> {
    try {
        const parsed = FillTableArgsSchema.parse(args ?? {});
        const result = await fillTableRows(path.resolve(parsed.directory), parsed.tableIndex, parsed.rows);
        return jsonResponse(result);
    } catch (error) {
        return errorToResponse(error, 'fill_table');
    }
}

/**
 * Handle insert_placeholders command
 */
export async function handleInsertPlaceholders(args: unknown): Promise<ServerResult> {
    try {
        const parsed = InsertPlaceholdersArgsSchema.parse(args ?? {});
        const result = await insertPlaceholders(path.resolve(parsed.directory), parsed.fields);
        return jsonResponse(result);
    } catch (error) {
        return errorToResponse(error, 'insert_placeholders');
    }
}

/**
 * Handle verify_fill command
 */
export async function handleVerifyFill(args: unknown): Promise<ServerResult> {
    try {
        const parsed = VerifyFillArgsSchema.parse(args ?? {});
        const report = await verifyFill(path.resolve(parsed.directory), parsed.expectedFields);
        return jsonResponse(report);
    } catch (error) {
        return errorToResponse(error, 'verify_fill');
    }
}

/**
 * Handle extract_data command.  With fieldNames, `values` is renamed to
 * template field names and narrowed to them.
 */
export async function handleExtractData(args: unknown): Promise<ServerResult> {
    try {
        const parsed = ExtractDataArgsSchema.parse(args ?? {});
        const data = await extractData(path.resolve(parsed.directory));
        if (!parsed.fieldNames) return jsonResponse(data);
        return jsonResponse({ ...data, values: renameExtracted(data.values, parsed.fieldNames) });
    } catch (error) {
        return errorToResponse(error, 'extract_data');
    }
}

/**
 * Handle pack_docx command
 */
export async function handlePackDocx(args: unknown): Promise<ServerResult> {
    try {
        const parsed = PackDocxArgsSchema.parse(args ?? {});
        if (!isDocxPath(parsed.outputPath)) {
            return createErrorResponse(`Output path must end in .docx: ${parsed.outputPath}`, {
                code: DocxErrorCode.INVALID_PATH,
                context: { outputPath: parsed.outputPath },
            });
        }

        const config = getConfig();
        const result = await pack(path.resolve(parsed.directory), path.resolve(parsed.outputPath), {
            force: parsed.force ?? config.forcePack,
            validator: new SofficeValidator({ binary: config.sofficePath, timeoutMs: config.validationTimeoutMs }),
        });
        return jsonResponse(result);
    } catch (error) {
        return errorToResponse(error, 'pack_docx');
    }
}
