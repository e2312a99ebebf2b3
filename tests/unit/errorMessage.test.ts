/**
 * Unit tests for public error message sanitization
 */

import { describe, it, expect } from "vitest";
import { escapeHtml, sanitizeErrorMessage } from "@/utils/http/errorMessage";

describe("escapeHtml", () => {
  it("should escape markup and quotes", () => {
    expect(escapeHtml(`<a href="x">Tom's</a> & co`)).toBe(
      "&lt;a href=&#34;x&#34;&gt;Tom&#39;s&lt;/a&gt; &amp; co",
    );
  });
});

describe("sanitizeErrorMessage", () => {
  it("should keep a plain message", () => {
    expect(sanitizeErrorMessage("failed to get user agent")).toBe("failed to get user agent");
  });

  it("should escape HTML", () => {
    expect(sanitizeErrorMessage("<b>bad</b>")).toBe("&lt;b&gt;bad&lt;/b&gt;");
  });

  it.each([
    "open /home/app/data/desktop_useragents.json: no such file",
    "cannot read /var/lib/catalog.json",
    "invalid password",
    "Token expired",
    "missing SECRET",
    "invalid API key",
    "failed to parse private key",
  ])("should hide sensitive message %j", (message) => {
    expect(sanitizeErrorMessage(message)).toBe("an error occurred");
  });

  it.each(["missing client key", "unknown key in catalog record", "desktop[0].ua keyword rejected"])(
    "should keep harmless messages that mention keys %j",
    (message) => {
      expect(sanitizeErrorMessage(message)).toBe(message);
    },
  );

  it("should apply the length limit after escaping", () => {
    expect(sanitizeErrorMessage("a".repeat(200))).toBe("a".repeat(200));
    expect(sanitizeErrorMessage("a".repeat(201))).toBe("an error occurred");
    expect(sanitizeErrorMessage("<".repeat(50))).toBe("&lt;".repeat(50));
    expect(sanitizeErrorMessage("<".repeat(51))).toBe("an error occurred");
  });
});
