/**
 * tests for html building helpers
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
	errorList,
	escapeHtml,
	field,
	form,
	formatDate,
	formErrors,
	genTag,
	headerRow,
	input,
	link,
	openTag,
	para,
	paragraphs,
	passwordInput,
	plural,
	row,
	table,
	tag,
	textarea,
	valueOf,
} from "../src/lib/html.ts";

// =============================================================================
// Escaping
// =============================================================================

test("escapeHtml - escapes all special characters", () => {
	assert.equal(
		escapeHtml(`<a href="x">Tom & Jerry's</a>`),
		"&#60;a href=&#34;x&#34;&#62;Tom &#38; Jerry&#39;s&#60;/a&#62;",
	);
});

// =============================================================================
// Tags
// =============================================================================

test("openTag - renders attributes", () => {
	assert.equal(
		openTag("input", { type: "text", required: true, disabled: false, size: 10 }),
		'<input type="text" required size="10">',
	);
});

test("openTag - escapes attribute values", () => {
	assert.equal(openTag("a", { title: 'say "hi"' }), '<a title="say &#34;hi&#34;">');
});

test("genTag - has no closing tag", () => {
	assert.equal(genTag("br"), "<br>");
});

test("tag - wraps content", () => {
	assert.equal(tag("em", {}, "x"), "<em>x</em>");
});

test("link - escapes its text", () => {
	assert.equal(link("<b>", "/x"), '<a href="/x">&#60;b&#62;</a>');
});

test("para - joins its parts", () => {
	assert.equal(para("a", "b"), "<p>ab</p>");
});

test("headerRow - escapes its labels", () => {
	assert.equal(headerRow("a<b", "c"), "<tr><th>a&#60;b</th><th>c</th></tr>");
});

test("table - rows of html cells", () => {
	assert.equal(
		table(row(link("x", "/x"), ""), { class: "users" }),
		'<table class="users"><tr><td><a href="/x">x</a></td><td></td></tr></table>',
	);
});

// =============================================================================
// Text
// =============================================================================

test("paragraphs - blank lines split paragraphs", () => {
	assert.equal(
		paragraphs("one\ntwo\n\nthree & four\r\n\r\n\r\n"),
		"<p>one<br>two</p>\n<p>three &#38; four</p>",
	);
});

test("formatDate - long month and twelve hour clock", () => {
	assert.equal(formatDate("2024-03-04T09:05:00.000Z"), "March 4, 2024, 9:05 a.m.");
	assert.equal(formatDate("2024-12-25T00:30:00.000Z"), "December 25, 2024, 12:30 a.m.");
	assert.equal(formatDate("2024-07-01T15:00:00.000Z"), "July 1, 2024, 3:00 p.m.");
});

test("plural - singular for one", () => {
	assert.equal(plural(1, "article"), "1 article");
	assert.equal(plural(0, "article"), "0 articles");
	assert.equal(plural(2, "article"), "2 articles");
});

// =============================================================================
// Forms
// =============================================================================

test("form - posts with the csrf token", () => {
	assert.equal(
		form("/go/", "abc", "X"),
		'<form method="post" action="/go/"><input type="hidden" name="csrfmiddlewaretoken" value="abc">X</form>',
	);
});

test("input - has an id for its label", () => {
	assert.equal(
		input("title", "a\"b"),
		'<input type="text" name="title" id="id_title" value="a&#34;b">',
	);
});

test("passwordInput - never carries a value", () => {
	assert.equal(
		passwordInput("password"),
		'<input type="password" name="password" id="id_password">',
	);
});

test("textarea - escapes its content", () => {
	assert.equal(
		textarea("body", "<script>"),
		'<textarea name="body" id="id_body" rows="10" cols="60">&#60;script&#62;</textarea>',
	);
});

test("errorList - empty without messages", () => {
	assert.equal(errorList(undefined), "");
	assert.equal(errorList([]), "");
	assert.equal(
		errorList(["Bad & wrong"]),
		'<ul class="errorlist"><li>Bad &#38; wrong</li></ul>',
	);
});

test("field - label, errors and widget", () => {
	assert.equal(
		field("title", "Title:", "W", { title: ["Required."] }),
		'<p><ul class="errorlist"><li>Required.</li></ul><label for="id_title">Title:</label> W</p>',
	);
});

test("formErrors - only the form-wide messages", () => {
	assert.equal(
		formErrors({ __all__: ["Nope."], title: ["Other."] }),
		'<ul class="errorlist"><li>Nope.</li></ul>',
	);
});

test("valueOf - empty for missing values", () => {
	assert.equal(valueOf(undefined, "title"), "");
	assert.equal(valueOf({ title: "x" }, "title"), "x");
	assert.equal(valueOf({}, "title"), "");
});
