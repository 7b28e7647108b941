/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const select = p.select;
export const text = p.text;
export const isCancel = p.isCancel;
