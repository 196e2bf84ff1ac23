import {Server} from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    type CallToolRequest,
    type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type {ZodTypeAny} from "zod";
import {zodToJsonSchema} from "zod-to-json-schema";

import {
    UnpackDocxArgsSchema,
    FindPlaceholdersArgsSchema,
    FillFieldsArgsSchema,
    FillTableArgsSchema,
    InsertPlaceholdersArgsSchema,
    ExtractDataArgsSchema,
    VerifyFillArgsSchema,
    PackDocxArgsSchema,
} from './tools/schemas.js';
import * as handlers from './handlers/index.js';
import {createErrorResponse} from './error-handlers.js';
import type {ServerResult} from './types.js';
import {VERSION} from './version.js';
import {logToStderr} from './utils/logger.js';

export const SERVER_NAME = "docx-field-filler";

export const server = new Server(
    {
        name: SERVER_NAME,
        version: VERSION,
    },
    {
        capabilities: {
            tools: {},
        },
    },
);

/**
 * JSON Schema for a tool's arguments.  Tool input schemas must be plain
 * objects, so only the object keywords are carried over.
 */
function toolInputSchema(schema: ZodTypeAny): Tool['inputSchema'] {
    const json = zodToJsonSchema(schema);
    const properties = 'properties' in json ? json.properties : {};
    const required = 'required' in json ? json.required : undefined;
    return {type: 'object', properties, ...(required ? {required} : {})};
}

export const TOOLS: Tool[] = [
    {
        name: "unpack_docx",
        description: `
            Unpack a .docx archive into a directory of pretty-printed XML parts.
            Media and other binary parts are copied unchanged.
            Run this first; every other tool works on the unpacked directory.`,
        inputSchema: toolInputSchema(UnpackDocxArgsSchema),
        annotations: {
            title: "Unpack DOCX",
            readOnlyHint: false,
        },
    },
    {
        name: "find_placeholders",
        description: `
            List the distinct {{name}} placeholders in an unpacked document,
            in the order they first appear. Headers and footers are included
            unless includeHeadersFooters is false. With outputFile, also writes
            {"placeholders": [...], "count": N} to that path.`,
        inputSchema: toolInputSchema(FindPlaceholdersArgsSchema),
        annotations: {
            title: "Find Placeholders",
            readOnlyHint: true,
        },
    },
    {
        name: "insert_placeholders",
        description: `
            Add {{fieldName}} placeholders next to labels in a template that has none.
            location "below_label" puts the token in the paragraph after the label,
            "inline" appends it to the label's own paragraph.`,
        inputSchema: toolInputSchema(InsertPlaceholdersArgsSchema),
        annotations: {
            title: "Insert Placeholders",
            readOnlyHint: false,
        },
    },
    {
        name: "fill_fields",
        description: `
            Fill fields of an unpacked document from a name → value mapping
            (inline fieldMapping, or a JSON mappingFile).
            Names are matched as {{placeholders}}, content-control aliases/tags,
            form labels ("Name: ____"), table headers and run w:id attributes,
            in that order.
            Fields that cannot be found are reported as skipped, not as errors.
            Formatting of the replaced text is kept.`,
        inputSchema: toolInputSchema(FillFieldsArgsSchema),
        annotations: {
            title: "Fill Fields",
            readOnlyHint: false,
        },
    },
    {
        name: "fill_table",
        description: `
            Write a list of rows into a table of an unpacked document.
            Row 0 of the table (tableIndex counts from 0) is the header and row 1
            the template: the template and any rows below it are replaced by one
            copy per entry of rows, each cell taking the value under its header text.`,
        inputSchema: toolInputSchema(FillTableArgsSchema),
        annotations: {
            title: "Fill Table",
            readOnlyHint: false,
        },
    },
    {
        name: "verify_fill",
        description: `
            Check an unpacked document after filling: no expected placeholder left,
            mandatory parts present, and every XML part well-formed.`,
        inputSchema: toolInputSchema(VerifyFillArgsSchema),
        annotations: {
            title: "Verify Fill",
            readOnlyHint: true,
        },
    },
    {
        name: "extract_data",
        description: `
            Read values out of an unpacked document: its text, every table as rows
            of cell texts, and the text of each content control that has an alias.
            values merges the content controls with the first table's header row and
            first data row. fieldNames (source name → template name) renames values
            so they can be passed to fill_fields.`,
        inputSchema: toolInputSchema(ExtractDataArgsSchema),
        annotations: {
            title: "Extract Data",
            readOnlyHint: true,
        },
    },
    {
        name: "pack_docx",
        description: `
            Pack an unpacked directory back into a .docx archive.
            The archive is opened with LibreOffice to check it; when LibreOffice
            is not installed, pass force: true to pack without that check.`,
        inputSchema: toolInputSchema(PackDocxArgsSchema),
        annotations: {
            title: "Pack DOCX",
            readOnlyHint: false,
        },
    },
];

server.setRequestHandler(ListToolsRequestSchema, async () => {
    logToStderr('debug', `Returning ${TOOLS.length} tools`);
    return {
        tools: TOOLS,
    };
});

/**
 * Route a tool call to its handler.
 */
export async function callTool(name: string, args: unknown): Promise<ServerResult> {
    switch (name) {
        case "unpack_docx":
            return handlers.handleUnpackDocx(args);
        case "find_placeholders":
            return handlers.handleFindPlaceholders(args);
        case "insert_placeholders":
            return handlers.handleInsertPlaceholders(args);
        case "fill_fields":
            return handlers.handleFillFields(args);
        case "fill_table":
            return handlers.handleFillTable(args);
        case "extract_data":
            return handlers.handleExtractData(args);
        case "verify_fill":
            return handlers.handleVerifyFill(args);
        case "pack_docx":
            return handlers.handlePackDocx(args);
        default:
            return createErrorResponse(`Unknown tool: ${name}`);
    }
}

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest): Promise<ServerResult> => {
    const {name, arguments: args} = request.params;
    const startTime = Date.now();
    const result = await callTool(name, args);
    logToStderr('debug', `${name} finished in ${Date.now() - startTime} ms${result.isError ? ' with an error' : ''}`);
    return result;
});
