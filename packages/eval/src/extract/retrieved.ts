/**
 * Retrieved document extraction.
 *
 * Scans assistant tool calls for invocations of the retrieval tool and
 * pulls the document reference out of one named argument.
 */

import {
  assertTranscript,
  getToolCallArguments,
  getToolCallName,
  hasToolCalls,
  parseToolArguments,
} from "@groundtruth/messages";
import type { DocumentId, DocumentIdParser } from "../types.js";
import { toRawDocumentId } from "../parsers.js";

/** What to look for in the transcript. */
export interface RetrievedDocumentsOptions {
  /** Name of the retrieval tool. */
  toolName: string;
  /** Argument holding the document reference. */
  argName: string;
  parser: DocumentIdParser;
}

/**
 * Extract the documents retrieved during a conversation, in call order.
 *
 * Duplicates are kept; callers count distinct identifiers. A tool call with
 * undecodable arguments, no `argName` argument, or a reference the parser
 * rejects is skipped without affecting the others.
 *
 * @param completion - The recorded conversation.
 * @throws TranscriptError when `completion` is not an array.
 */
export function extractRetrievedDocuments(
  completion: unknown,
  options: RetrievedDocumentsOptions,
): DocumentId[] {
  assertTranscript(completion);

  const retrieved: DocumentId[] = [];
  for (const message of completion) {
    if (!hasToolCalls(message)) continue;

    for (const toolCall of message.tool_calls) {
      if (getToolCallName(toolCall) !== options.toolName) continue;

      try {
        const args = parseToolArguments(getToolCallArguments(toolCall), options.toolName);
        if (!Object.hasOwn(args, options.argName)) continue;
        retrieved.push(options.parser.parse(toRawDocumentId(args[options.argName])));
      } catch {
        // Skip this call only; malformed entries do not abort the scan.
        continue;
      }
    }
  }
  return retrieved;
}
