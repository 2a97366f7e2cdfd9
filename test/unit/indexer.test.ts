// Unit tests for indexer.ts and aria.ts
// Pure functions over literal markup; no driver involved.

import { describe, it, expect } from "vitest";
import {
  describeElement,
  findByRole,
  findBySelector,
  findByText,
  foldText,
  index,
  isDynamicClass,
  normalizeText,
  parse,
} from "../../src/indexer.js";
import { parseAriaSnapshot, roleSelector } from "../../src/aria.js";

// --- Selector priority ---

describe("parse: selectors", () => {
  const markup =
    "<body>" +
    '<button id="go">Go</button>' +
    '<button data-testid="save">Save</button>' +
    '<input name="q">' +
    '<a class="nav-link" href="/">Home</a>' +
    '<span role="button">Close</span>' +
    "<div><button>Buy</button></div>" +
    "<div><button>Buy</button></div>" +
    "</body>";

  const elements = parse(markup);

  it("finds every interactive element in document order", () => {
    expect(elements.map((e) => e.text)).toEqual(["Go", "Save", "", "Home", "Close", "Buy", "Buy"]);
  });

  it("prefers id, then data-testid, then name", () => {
    expect(elements[0].selector).toBe("#go");
    expect(elements[1].selector).toBe('[data-testid="save"]');
    expect(elements[2].selector).toBe('input[name="q"]');
  });

  it("uses a unique stable class combination", () => {
    expect(elements[3].selector).toBe("a.nav-link");
  });

  it("falls back to role + name when the name is unique", () => {
    expect(elements[4].selector).toBe('role=button[name="Close"]');
  });

  it("falls back to the structural path for duplicates", () => {
    expect(elements[5].selector).toBe("body > div:nth-of-type(1) > button");
    expect(elements[6].selector).toBe("body > div:nth-of-type(2) > button");
  });

  it("uses the DOM id or a positional ref as element id", () => {
    expect(elements.map((e) => e.id)).toEqual(["go", "e2", "e3", "e4", "e5", "e6", "e7"]);
  });

  it("assigns implicit roles", () => {
    expect(elements.map((e) => e.role)).toEqual(["button", "button", "textbox", "link", "button", "button", "button"]);
  });

  it("escapes quotes in attribute selectors", () => {
    const [el] = parse('<body><button data-testid="say &quot;hi&quot;">Hi</button></body>');
    expect(el.selector).toBe('[data-testid="say \\"hi\\""]');
  });

  it("quotes ids that are not plain identifiers", () => {
    const [el] = parse('<body><button id="1st">One</button></body>');
    expect(el.selector).toBe('[id="1st"]');
  });
});

describe("isDynamicClass", () => {
  it("flags generated and state classes", () => {
    expect(isDynamicClass("css-1x2y3z")).toBe(true);
    expect(isDynamicClass("sc-a1b2c3")).toBe(true);
    expect(isDynamicClass("btn_x7k2pq")).toBe(true);
    expect(isDynamicClass("is-active")).toBe(true);
    expect(isDynamicClass("active")).toBe(true);
  });

  it("keeps readable classes", () => {
    expect(isDynamicClass("nav-link")).toBe(false);
    expect(isDynamicClass("primary")).toBe(false);
  });

  it("ignores dynamic classes when building class selectors", () => {
    const [el] = parse('<body><a class="menu css-9f8e7d" href="#">Menu</a></body>');
    expect(el.selector).toBe("a.menu");
  });
});

// --- Interactivity and visibility ---

describe("parse: interactivity", () => {
  it("skips hidden elements and their subtrees", () => {
    const elements = parse(
      "<body>" +
        '<input type="hidden" name="token">' +
        '<button style="display: none">X</button>' +
        '<div aria-hidden="true"><a href="#">Skip</a></div>' +
        "<section hidden><button>Ghost</button></section>" +
        "<button>Shown</button>" +
        "</body>",
    );
    expect(elements.map((e) => e.text)).toEqual(["Shown"]);
  });

  it("recognises affordance attributes", () => {
    const elements = parse(
      "<body>" +
        '<div onclick="go()">Tile</div>' +
        '<div tabindex="0">Focusable</div>' +
        '<div tabindex="-1">Not focusable</div>' +
        '<div contenteditable="true">Edit</div>' +
        '<div contenteditable="false">Read only</div>' +
        "<div>Plain</div>" +
        "</body>",
    );
    expect(elements.map((e) => e.text)).toEqual(["Tile", "Focusable", "Edit"]);
  });

  it("reads input buttons by value", () => {
    const [el] = parse('<body><input type="submit" value="Send"></body>');
    expect(el).toMatchObject({ tag: "input", role: "button", text: "Send" });
  });

  it("marks disabled elements", () => {
    const elements = parse('<body><button disabled>A</button><button aria-disabled="true">B</button><button>C</button></body>');
    expect(elements.map((e) => e.disabled)).toEqual([true, true, false]);
  });
});

describe("parse: labels", () => {
  const elements = parse(
    "<body>" +
      '<label for="email">Email address</label>' +
      '<input id="email" placeholder="you@example.com">' +
      '<label>Remember me <input type="checkbox" name="remember"></label>' +
      '<button aria-label="Close dialog">x</button>' +
      '<span id="lbl">Search the site</span><input aria-labelledby="lbl" type="search">' +
      "</body>",
  );

  it("takes labels from label[for]", () => {
    expect(elements[0]).toMatchObject({ id: "email", label: "Email address", placeholder: "you@example.com" });
  });

  it("takes labels from a wrapping label", () => {
    expect(elements[1]).toMatchObject({ role: "checkbox", label: "Remember me", selector: 'input[name="remember"]' });
  });

  it("prefers aria-label over text", () => {
    expect(elements[2]).toMatchObject({ label: "Close dialog", text: "x" });
  });

  it("resolves aria-labelledby", () => {
    expect(elements[3]).toMatchObject({ role: "searchbox", label: "Search the site" });
  });
});

// --- index() ---

describe("index", () => {
  it("collects normalized page text without scripts or styles", () => {
    const idx = index("<body><p>Hello   World</p><script>var secret = 1;</script><style>.a{}</style><button>OK</button></body>");
    expect(idx.text).toBe("hello world ok");
  });

  it("flags consent banners and modal dialogs", () => {
    expect(index('<body><div id="onetrust-banner-sdk"><button>Accept</button></div></body>').overlay).toBe(true);
    expect(index('<body><div role="dialog" aria-modal="true"><button>OK</button></div></body>').overlay).toBe(true);
    expect(index("<body><dialog open><button>OK</button></dialog></body>").overlay).toBe(true);
    expect(index("<body><button>OK</button></body>").overlay).toBe(false);
  });

  it("returns an empty index for blank markup", () => {
    expect(index("   ")).toEqual({ elements: [], text: "", overlay: false });
  });

  it("routes non-HTML input to the aria parser", () => {
    const idx = index('- button "Sign in"');
    expect(idx.elements[0].selector).toBe('role=button[name="Sign in"]');
  });
});

// --- Lookups ---

describe("lookups", () => {
  const elements = parse(
    "<body>" +
      '<button id="signin">Sign in</button>' +
      '<a href="/in">Sign in with SSO</a>' +
      '<input id="user" placeholder="Username">' +
      "</body>",
  );

  it("findByText matches text, label and placeholder, exact first", () => {
    expect(findByText(elements, "Sign in").map((e) => e.id)).toEqual(["signin", "e2"]);
    expect(findByText(elements, "Username").map((e) => e.id)).toEqual(["user"]);
  });

  it("findByText is case-sensitive unless fuzzy", () => {
    expect(findByText(elements, "sign-in")).toEqual([]);
    expect(findByText(elements, "sign-in", { fuzzy: true }).map((e) => e.id)).toEqual(["signin", "e2"]);
  });

  it("findByRole", () => {
    expect(findByRole(elements, "LINK").map((e) => e.id)).toEqual(["e2"]);
  });

  it("findBySelector matches selector, path or #id", () => {
    expect(findBySelector(elements, "#signin")?.text).toBe("Sign in");
    expect(findBySelector(elements, elements[1].path)?.id).toBe("e2");
    expect(findBySelector(elements, "#missing")).toBeUndefined();
  });

  it("describeElement", () => {
    expect(describeElement(elements[0])).toBe("<button id='signin' text='Sign in'>");
    expect(describeElement(elements[1])).toBe("<a role='link' text='Sign in with SSO'>");
    expect(describeElement(elements[2])).toBe("<input role='textbox' id='user' placeholder='Username'>");
  });
});

describe("text helpers", () => {
  it("normalizeText collapses whitespace and case", () => {
    expect(normalizeText("  Sign\n\tIN  ")).toBe("sign in");
  });

  it("foldText strips punctuation", () => {
    expect(foldText("Sign-in!")).toBe("sign in");
  });
});

// --- Aria snapshots ---

describe("parseAriaSnapshot", () => {
  const snapshot = [
    "- banner:",
    '  - link "Home"',
    "- main:",
    '  - heading "Welcome" [level=1]',
    '  - textbox "Email"',
    '  - button "Next"',
    '  - button "Next" [disabled]',
    "  - paragraph: Enter your email",
  ].join("\n");

  const idx = parseAriaSnapshot(snapshot);

  it("indexes interactive roles with paths", () => {
    expect(idx.elements.map((e) => [e.id, e.role, e.path])).toEqual([
      ["e1", "link", "banner > link"],
      ["e2", "textbox", "main > textbox"],
      ["e3", "button", "main > button[0]"],
      ["e4", "button", "main > button[1]"],
    ]);
  });

  it("disambiguates duplicate role/name pairs with nth", () => {
    expect(idx.elements[0].selector).toBe('role=link[name="Home"]');
    expect(idx.elements[2].selector).toBe('role=button[name="Next"] >> nth=0');
    expect(idx.elements[3].selector).toBe('role=button[name="Next"] >> nth=1');
    expect(idx.elements[3].disabled).toBe(true);
  });

  it("treats textbox names as labels", () => {
    expect(idx.elements[1]).toMatchObject({ text: "", label: "Email" });
  });

  it("collects names and inline text", () => {
    expect(idx.text).toBe("home welcome email next next enter your email");
    expect(idx.overlay).toBe(false);
  });

  it("flags dialogs and consent names as overlays", () => {
    expect(parseAriaSnapshot('- dialog "Preferences":\n  - button "Save"').overlay).toBe(true);
    expect(parseAriaSnapshot('- region "Cookie consent":\n  - button "OK"').overlay).toBe(true);
  });

  it("roleSelector", () => {
    expect(roleSelector("button", "")).toBe("role=button");
    expect(roleSelector("link", "Docs", 2)).toBe('role=link[name="Docs"] >> nth=2');
  });
});
