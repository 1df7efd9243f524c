/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * xml.ts: XML utilities for dashgeo.
 */

/**
 * Escapes XML special characters so a string can be embedded in element text or a quoted attribute.
 * @param text - The text to escape.
 * @returns The escaped text.
 */
export function escapeXml(text: string): string {

  const replacements: Record<string, string> = {

    "\"": "&quot;",
    "&": "&amp;",
    "'": "&apos;",
    "<": "&lt;",
    ">": "&gt;"
  };

  return text.replace(/[&<>"']/g, (char) => replacements[char] ?? char);
}
