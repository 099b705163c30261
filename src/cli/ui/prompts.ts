/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const confirm = p.confirm;
export const isCancel = p.isCancel;
