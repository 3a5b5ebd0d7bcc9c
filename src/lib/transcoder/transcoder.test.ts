// /src/lib/transcoder/transcoder.test.ts
import { describe, it, expect, vi } from "vitest";

import { DEFAULT_TABLE_NAMES, type CanonicalRecord } from "../../contracts";
import { MemoryRecordStore, captureLogger } from "../../test/fakes";
import { RecordFetcher } from "../airtable/fetchAll";
import { RetryExecutor } from "../resilience/retry";
import { RecordTranscoder } from "./transcoder";

const T = DEFAULT_TABLE_NAMES;

function setup() {
  const store = new MemoryRecordStore(2);
  const { logger, entries } = captureLogger();
  const executor = new RetryExecutor({ sleep: vi.fn(async (_ms: number) => {}), logger });
  const fetcher = new RecordFetcher(store, executor, logger);
  const transcoder = new RecordTranscoder({ store, fetcher, executor, tables: T, logger });
  return { store, entries, transcoder };
}

function seedApplicantRows(store: MemoryRecordStore) {
  store.seed(T.personal, {
    "Applicant ID": ["APP-1"],
    "Full Name": "Ada Lovelace",
    Email: "ada@example.com",
    Location: "London, UK",
    LinkedIn: "https://linkedin.com/in/ada",
  });
  store.seed(T.personal, { "Applicant ID": ["APP-2"], "Full Name": "Someone Else" });
  store.seed(T.experience, {
    "Applicant ID": ["APP-1"],
    Company: "Analytical Engines Ltd",
    Title: "Engineer",
    "Start Date": "2018-03-01",
    "End Date": "2021-06-30",
    Technologies: "Go, SQL",
  });
  store.seed(T.experience, { "Applicant ID": ["APP-2"], Company: "Elsewhere" });
  store.seed(T.experience, {
    "Applicant ID": ["APP-9", "APP-1"],
    Company: "Difference Co",
    Title: "Lead",
    "Start Date": "2021-07-01",
  });
  store.seed(T.salary, {
    "Applicant ID": ["APP-1"],
    "Preferred Rate": 85,
    "Minimum Rate": "70",
    Availability: 30,
  });
}

const APP1_RECORD: CanonicalRecord = {
  personal: {
    name: "Ada Lovelace",
    email: "ada@example.com",
    location: "London, UK",
    linkedin: "https://linkedin.com/in/ada",
  },
  experience: [
    {
      company: "Analytical Engines Ltd",
      title: "Engineer",
      start: "2018-03-01",
      end: "2021-06-30",
      technologies: "Go, SQL",
    },
    { company: "Difference Co", title: "Lead", start: "2021-07-01", end: "", technologies: "" },
  ],
  salary: { preferred_rate: 85, minimum_rate: 70, currency: "USD", availability: 30 },
};

describe("RecordTranscoder.compress", () => {
  it("maps the linked rows through the field dictionary", async () => {
    const { store, transcoder } = setup();
    seedApplicantRows(store);

    await expect(transcoder.compress("APP-1")).resolves.toEqual(APP1_RECORD);
  });

  it("gives the same record when called twice on unchanged tables", async () => {
    const { store, transcoder } = setup();
    seedApplicantRows(store);

    const first = await transcoder.compress("APP-1");
    const second = await transcoder.compress("APP-1");

    expect(second).toEqual(first);
  });

  it("only matches rows whose link field is a list containing the id", async () => {
    const { store, transcoder } = setup();
    store.seed(T.personal, { "Applicant ID": "APP-1", "Full Name": "Scalar Link" });

    const record = await transcoder.compress("APP-1");

    expect(record?.personal.name).toBe("");
  });

  it("fills default sections when the applicant has no rows", async () => {
    const { transcoder } = setup();

    await expect(transcoder.compress("APP-404")).resolves.toEqual({
      personal: { name: "", email: "", location: "", linkedin: "" },
      experience: [],
      salary: { preferred_rate: 0, minimum_rate: 0, currency: "USD", availability: 0 },
    });
  });

  it("returns null and logs when a table cannot be read", async () => {
    const { store, entries, transcoder } = setup();
    store.failWhen("list", T.experience);

    await expect(transcoder.compress("APP-1")).resolves.toBeNull();
    expect(entries).toContainEqual({
      level: "error",
      message: "Error compressing data for APP-1: simulated list failure",
    });
  });
});

describe("RecordTranscoder.decompress", () => {
  it("rejects malformed JSON without touching the store", async () => {
    const { store, transcoder } = setup();

    await expect(transcoder.decompress("APP-1", "{not json")).resolves.toBe(false);
    expect(store.calls).toEqual([]);
  });

  it("rejects sections of the wrong shape without touching the store", async () => {
    const { store, transcoder } = setup();

    await expect(transcoder.decompress("APP-1", '{"experience":"ten years"}')).resolves.toBe(false);
    expect(store.calls).toEqual([]);
  });

  it("updates personal in place, creates salary, and replaces experience", async () => {
    const { store, transcoder } = setup();
    seedApplicantRows(store);
    const salaryBefore = store.rows(T.salary);
    const personalId = store.rows(T.personal)[0].id;

    const doc = {
      personal: { name: "Ada King", email: "ada@example.com", location: "London, UK", linkedin: "" },
      experience: [{ company: "Babbage & Co", title: "Analyst", start: "2015-01-01", end: "2017-12-31", technologies: "" }],
    };

    await expect(transcoder.decompress("APP-1", JSON.stringify(doc))).resolves.toBe(true);

    const personal = store.rows(T.personal);
    expect(personal[0].id).toBe(personalId);
    expect(personal[0].fields["Full Name"]).toBe("Ada King");
    expect(personal).toHaveLength(2);

    const experience = store.rows(T.experience);
    expect(experience.map((r) => r.fields.Company)).toEqual(["Elsewhere", "Babbage & Co"]);
    expect(experience[1].fields["Applicant ID"]).toEqual(["APP-1"]);

    // no salary section in the document
    expect(store.rows(T.salary)).toEqual(salaryBefore);
  });

  it("creates personal and salary rows when none are linked yet", async () => {
    const { store, transcoder } = setup();

    const ok = await transcoder.decompress(
      "APP-3",
      JSON.stringify({ salary: { preferred_rate: 95, availability: 25 } }),
    );

    expect(ok).toBe(true);
    expect(store.rows(T.salary)).toEqual([
      {
        id: "rec1",
        fields: {
          "Applicant ID": ["APP-3"],
          "Preferred Rate": 95,
          "Minimum Rate": 0,
          Currency: "USD",
          Availability: 25,
        },
      },
    ]);
    expect(store.rows(T.personal)).toEqual([]);
  });

  it("round-trips a canonical record through the tables", async () => {
    const { transcoder } = setup();
    const record: CanonicalRecord = {
      personal: { name: "Grace Hopper", email: "grace@example.com", location: "Arlington, USA", linkedin: "in/grace" },
      experience: [
        { company: "Navy", title: "Officer", start: "2010-01-01", end: "2014-01-01", technologies: "COBOL" },
        { company: "Remington Rand", title: "Programmer", start: "2014-02-01", end: "present", technologies: "FLOW-MATIC" },
        { company: "Harvard", title: "Researcher", start: "2009-01-01", end: "2009-12-31", technologies: "Mark I" },
      ],
      salary: { preferred_rate: 90, minimum_rate: 75, currency: "EUR", availability: 35 },
    };

    await expect(transcoder.decompress("APP-7", JSON.stringify(record))).resolves.toBe(true);
    await expect(transcoder.compress("APP-7")).resolves.toEqual(record);
  });

  it("accepts a null end date and stores it as empty", async () => {
    const { store, transcoder } = setup();
    const doc = { experience: [{ company: "Acme", start: "2015-01-01", end: null }] };

    await expect(transcoder.decompress("APP-1", JSON.stringify(doc))).resolves.toBe(true);
    expect(store.rows(T.experience).map((r) => r.fields)).toEqual([
      {
        "Applicant ID": ["APP-1"],
        Company: "Acme",
        Title: "",
        "Start Date": "2015-01-01",
        "End Date": "",
        Technologies: "",
      },
    ]);
  });

  it("stops at the failing step and keeps what was already written", async () => {
    const { store, transcoder } = setup();
    store.failWhen("create", T.experience, { skip: 1 });

    const doc: CanonicalRecord = {
      personal: { name: "Partial", email: "", location: "", linkedin: "" },
      experience: [
        { company: "First", title: "", start: "", end: "", technologies: "" },
        { company: "Second", title: "", start: "", end: "", technologies: "" },
      ],
      salary: { preferred_rate: 50, minimum_rate: 40, currency: "USD", availability: 40 },
    };

    await expect(transcoder.decompress("APP-5", JSON.stringify(doc))).resolves.toBe(false);
    expect(store.rows(T.personal)).toHaveLength(1);
    expect(store.rows(T.experience).map((r) => r.fields.Company)).toEqual(["First"]);
    expect(store.rows(T.salary)).toEqual([]);
  });
});
