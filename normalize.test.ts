import { describe, expect, it } from "vitest";
import { parseBibtex } from "./bibtex.ts";
import { cleanValue, normalize, parseMonth, splitBibtexNames } from "./normalize.ts";
import { parseRis } from "./ris.ts";
import { toBibtex } from "./serialize.ts";

function bibtexReference(text: string) {
  return normalize(parseBibtex(text, "refs.bib").entries[0]);
}

function risReference(text: string) {
  return normalize(parseRis(text, "refs.ris").entries[0]);
}

describe("splitBibtexNames", () => {
  it("reorders Last, First names", () => {
    expect(splitBibtexNames("Smith, John and Doe, Jane")).toEqual([
      "John Smith",
      "Jane Doe",
    ]);
  });

  it("moves a name suffix behind the family name", () => {
    expect(splitBibtexNames("van Beethoven, Jr, Ludwig")).toEqual([
      "Ludwig van Beethoven Jr",
    ]);
  });

  it("does not split inside braces or inside words", () => {
    expect(splitBibtexNames("{Barnes and Noble, Inc.} AND Anderson, Alice"))
      .toEqual(["Barnes and Noble, Inc.", "Alice Anderson"]);
  });

  it("reads a braced family name before top-level commas", () => {
    expect(splitBibtexNames("{Barnes and Noble}, Jr, Ann")).toEqual([
      "Ann Barnes and Noble Jr",
    ]);
    let ref = bibtexReference(
      "@book{b1, title = {Shelves}, author = {{Barnes and Noble}, Jr, Ann and Doe, Jane}}",
    );
    expect(ref.authors).toEqual(["Ann Barnes and Noble Jr", "Jane Doe"]);
    expect(bibtexReference(toBibtex(ref)).authors).toEqual(ref.authors);
  });
});

describe("parseMonth", () => {
  it.each([
    ["3", "03"],
    ["12", "12"],
    ["March", "03"],
    ["dec", "12"],
    ["13", ""],
    ["0", ""],
    ["spring", ""],
  ])("%s → %s", (input, expected) => {
    expect(parseMonth(input)).toBe(expected);
  });
});

describe("cleanValue", () => {
  it("drops grouping braces and keeps escaped ones", () => {
    expect(cleanValue("The {DNA}   of \\{x\\}")).toBe("The DNA of \\{x\\}");
  });
});

describe("normalize (BibTeX)", () => {
  it("maps an article onto the canonical fields", () => {
    let ref = bibtexReference(`@article{smith2024,
  title = {An {Innovative} Approach},
  author = {Smith, John and Doe, Jane},
  journal = {J. Test},
  year = {2024},
  month = mar,
  pages = {1--10},
  publisher = {ACM},
  keywords = {a, b},
}`);
    expect(ref).toEqual({
      format: "bibtex",
      type: "article",
      key: "smith2024",
      title: "An Innovative Approach",
      authors: ["John Smith", "Jane Doe"],
      venue: "J. Test",
      venueField: "journal",
      year: "2024",
      month: "03",
      volume: "",
      number: "",
      pages: "1--10",
      abstract: "",
      url: "",
      doi: "",
      extra: [
        { name: "publisher", value: "ACM" },
        { name: "keywords", value: "a, b" },
      ],
    });
  });

  it("takes the venue from booktitle when there is no journal", () => {
    let ref = bibtexReference(
      "@inproceedings{k, booktitle = {Proc. Testing}, publisher = {X}}",
    );
    expect(ref.venue).toBe("Proc. Testing");
    expect(ref.venueField).toBe("booktitle");
  });

  it("reads year and month from date only when year is missing", () => {
    expect(bibtexReference("@misc{k, date = {2021-07-15}}")).toMatchObject({
      year: "2021",
      month: "07",
      extra: [],
    });
    expect(bibtexReference("@misc{k, year = 2020, date = {2021-07-15}}"))
      .toMatchObject({
        year: "2020",
        month: "",
        extra: [{ name: "date", value: "2021-07-15" }],
      });
  });

  it("keeps an unrecognized month as a passthrough field", () => {
    let ref = bibtexReference("@misc{k, year = 2020, month = {Spring}}");
    expect(ref.month).toBe("");
    expect(ref.extra).toEqual([{ name: "month", value: "Spring" }]);
  });

  it("keeps a repeated field as a passthrough field", () => {
    let ref = bibtexReference("@misc{k, title = {One}, title = {Two}}");
    expect(ref.title).toBe("One");
    expect(ref.extra).toEqual([{ name: "title", value: "Two" }]);
  });

  it("defaults missing fields to empty strings", () => {
    let ref = bibtexReference("@misc{bare}");
    expect(ref.title).toBe("");
    expect(ref.authors).toEqual([]);
    expect(ref.year).toBe("");
  });
});

describe("normalize (RIS)", () => {
  it("maps a record onto the canonical fields", () => {
    let ref = risReference(`TY  - JOUR
ID  - ris1
T1  - Primary Title
A1  - Smith, John
AU  - Doe, Jane
JF  - Full Journal
PY  - 2023/05/01/
IS  - 4
SP  - 10
KW  - alpha
KW  - beta
N1  - a note
ER  - `);
    expect(ref).toEqual({
      format: "ris",
      type: "JOUR",
      key: "ris1",
      title: "Primary Title",
      authors: ["Smith, John", "Doe, Jane"],
      venue: "Full Journal",
      venueField: "JF",
      year: "2023",
      month: "05",
      volume: "",
      number: "4",
      pages: "10",
      abstract: "",
      url: "",
      doi: "",
      extra: [
        { name: "KW", value: "alpha" },
        { name: "KW", value: "beta" },
        { name: "N1", value: "a note" },
      ],
    });
  });

  it("joins start and end pages", () => {
    let ref = risReference("TY  - JOUR\nSP  - 123\nEP  - 145\nER  - ");
    expect(ref.pages).toBe("123--145");
  });

  it("reads the month from DA when PY has only a year", () => {
    let ref = risReference("TY  - JOUR\nPY  - 2022\nDA  - 2022/11/02\nER  - ");
    expect(ref.year).toBe("2022");
    expect(ref.month).toBe("11");
    expect(ref.extra).toEqual([]);
  });

  it("keeps abstracts from N2 and a non-numeric year as written", () => {
    let ref = risReference("TY  - GEN\nN2  - Summary\nPY  - in press\nER  - ");
    expect(ref.abstract).toBe("Summary");
    expect(ref.year).toBe("in press");
  });
});
