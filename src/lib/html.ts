/**
 * html building helpers
 *
 * pages are assembled from strings. every helper that takes text escapes it;
 * helpers that take `content` expect html that is already safe.
 */

import { CSRF_FIELD } from "./csrf.ts";
import { FORM_ERRORS, type FieldErrors, type FormValues } from "./forms.ts";

// =============================================================================
// Escaping
// =============================================================================

/**
 * escape html entities
 */
export function escapeHtml(str: string): string {
	return str
		.replace(/&/g, "&#38;")
		.replace(/</g, "&#60;")
		.replace(/>/g, "&#62;")
		.replace(/"/g, "&#34;")
		.replace(/'/g, "&#39;");
}

// =============================================================================
// Tag Functions
// =============================================================================

export type Attrs = Record<string, string | number | boolean | undefined>;

/**
 * create an opening tag with attributes
 */
export function openTag(tag: string, attrs: Attrs = {}): string {
	let result = `<${tag}`;
	for (const [key, value] of Object.entries(attrs)) {
		if (value === undefined || value === false) continue;
		if (value === true) {
			result += ` ${key}`;
		} else {
			result += ` ${key}="${escapeHtml(String(value))}"`;
		}
	}
	result += ">";
	return result;
}

export function closeTag(tag: string): string {
	return `</${tag}>`;
}

/**
 * tag without a closing tag, such as input or meta
 */
export function genTag(tag: string, attrs: Attrs = {}): string {
	return openTag(tag, attrs);
}

/**
 * wrap content in a tag
 */
export function tag(tagName: string, attrs: Attrs, content: string): string {
	return openTag(tagName, attrs) + content + closeTag(tagName);
}

// =============================================================================
// Common HTML Elements
// =============================================================================

export function para(...args: string[]): string {
	return "<p>" + args.join("") + "</p>";
}

export function heading(level: 1 | 2 | 3, text: string): string {
	return tag(`h${level}`, {}, escapeHtml(text));
}

export function link(text: string, dest: string): string {
	return tag("a", { href: dest }, escapeHtml(text));
}

export function list(items: string[], attrs: Attrs = {}): string {
	return tag("ul", attrs, items.map((item) => tag("li", {}, item)).join(""));
}

export function spanClass(className: string, content: string): string {
	return tag("span", { class: className }, content);
}

export function divClass(className: string, content: string): string {
	return tag("div", { class: className }, content);
}

// =============================================================================
// Tables
// =============================================================================

export function table(content: string, attrs: Attrs = {}): string {
	return tag("table", attrs, content);
}

/**
 * header row
 */
export function headerRow(...cells: string[]): string {
	return tag("tr", {}, cells.map((c) => tag("th", {}, escapeHtml(c))).join(""));
}

/**
 * simple row of cells; cells are html
 */
export function row(...cells: string[]): string {
	return tag("tr", {}, cells.map((c) => tag("td", {}, c)).join(""));
}

/**
 * text with blank lines as paragraph breaks and single newlines as <br>
 */
export function paragraphs(text: string): string {
	return text
		.replace(/\r\n/g, "\n")
		.split(/\n{2,}/)
		.map((block) => block.trim())
		.filter((block) => block.length > 0)
		.map((block) => para(escapeHtml(block).replace(/\n/g, "<br>")))
		.join("\n");
}

/**
 * human readable date, e.g. "March 4, 2024, 9:05 a.m."
 */
export function formatDate(iso: string): string {
	const date = new Date(iso);
	const months = [
		"January",
		"February",
		"March",
		"April",
		"May",
		"June",
		"July",
		"August",
		"September",
		"October",
		"November",
		"December",
	];
	const hours = date.getUTCHours();
	const minutes = date.getUTCMinutes().toString().padStart(2, "0");
	const hour12 = hours % 12 === 0 ? 12 : hours % 12;
	const meridiem = hours < 12 ? "a.m." : "p.m.";
	return `${months[date.getUTCMonth()]} ${date.getUTCDate()}, ${date.getUTCFullYear()}, ${hour12}:${minutes} ${meridiem}`;
}

export function plural(n: number, word: string): string {
	return `${n} ${word}${n === 1 ? "" : "s"}`;
}

// =============================================================================
// Forms
// =============================================================================

export function hiddenInput(name: string, value: string): string {
	return genTag("input", { type: "hidden", name, value });
}

/**
 * post form carrying the csrf token
 */
export function form(action: string, csrfToken: string, content: string): string {
	return tag(
		"form",
		{ method: "post", action },
		hiddenInput(CSRF_FIELD, csrfToken) + content,
	);
}

export function input(
	name: string,
	value: string = "",
	type: "text" | "email" | "number" = "text",
	attrs: Attrs = {},
): string {
	return genTag("input", { type, name, id: `id_${name}`, value, ...attrs });
}

/**
 * password input; never prefilled
 */
export function passwordInput(name: string, attrs: Attrs = {}): string {
	return genTag("input", { type: "password", name, id: `id_${name}`, ...attrs });
}

export function textarea(
	name: string,
	content: string = "",
	rows: number = 10,
	cols: number = 60,
): string {
	return tag(
		"textarea",
		{ name, id: `id_${name}`, rows, cols },
		escapeHtml(content),
	);
}

export function submit(value: string = "Submit"): string {
	return genTag("input", { type: "submit", value });
}

/**
 * list of error messages, empty when there are none
 */
export function errorList(messages: string[] | undefined): string {
	if (!messages || messages.length === 0) return "";
	return list(messages.map(escapeHtml), { class: "errorlist" });
}

export function label(name: string, text: string): string {
	return tag("label", { for: `id_${name}` }, escapeHtml(text));
}

/**
 * a field's label, errors and widget together
 */
export function field(
	name: string,
	text: string,
	widget: string,
	errors: FieldErrors = {},
	help?: string,
): string {
	const helpText = help ? spanClass("helptext", escapeHtml(help)) : "";
	return tag(
		"p",
		{},
		errorList(errors[name]) + label(name, text) + " " + widget + helpText,
	);
}

/**
 * errors that belong to the whole form rather than one field
 */
export function formErrors(errors: FieldErrors = {}): string {
	return errorList(errors[FORM_ERRORS]);
}

/**
 * value previously submitted for a field, for redisplay
 */
export function valueOf(values: FormValues | undefined, name: string): string {
	return values?.[name] ?? "";
}

export const bar = " | ";
