//
// Output format classification by file name suffix.
//

export type FormatTag = "HtmlFormat" | "XmlFormat" | "JavaScriptFormat" | "TxtFormat";

export interface FormatRule {
    suffix: string;
    format: FormatTag;
}

export const DEFAULT_FORMAT: FormatTag = "TxtFormat";

export const DEFAULT_FORMAT_RULES: readonly FormatRule[] = [
    { suffix: "html", format: "HtmlFormat" },
    { suffix: "xml", format: "XmlFormat" },
    { suffix: "js", format: "JavaScriptFormat" },
    { suffix: "txt", format: "TxtFormat" }
];

/**
 * First rule whose suffix ends `fileName`, `undefined` when none does.
 */
export function matchFormat(fileName: string, rules: readonly FormatRule[] = DEFAULT_FORMAT_RULES): FormatTag | undefined {
    const rule = rules.find(r => fileName.endsWith(r.suffix));
    return rule?.format;
}

/**
 * Total over all file names: anything unmatched is `TxtFormat`.
 */
export function classifyFormat(fileName: string, rules: readonly FormatRule[] = DEFAULT_FORMAT_RULES): FormatTag {
    return matchFormat(fileName, rules) ?? DEFAULT_FORMAT;
}
