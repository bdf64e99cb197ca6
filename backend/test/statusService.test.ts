import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { InvalidDateError, UnknownApplicationError } from "../src/lib/errors.js";
import {
  diffStatusCounts,
  filterApplications,
  generateApplicationStats,
  parseTrackerDate,
  updateApplicationStatus,
  updateDateApplied,
  updateInterviewDate,
} from "../src/services/statusService.js";
import { makeRecord, makeTable } from "./helpers.js";

const NOW = new Date(2024, 4, 6, 9, 5);

describe("updateApplicationStatus", () => {
  it("sets the status and logs the manual note", () => {
    const table = makeTable([makeRecord({ notes: "Applied via referral" })]);

    const record = updateApplicationStatus(table, "J1", "Interviewed", "  onsite went well ", NOW);

    assert.equal(record.status, "Interviewed");
    assert.equal(record.notes, "Applied via referral\n[2024-05-06 09:05] Status changed to 'Interviewed': onsite went well");
  });

  it("leaves notes alone when none are given", () => {
    const table = makeTable([makeRecord({ notes: "kept" })]);
    updateApplicationStatus(table, "J1", "Offered", undefined, NOW);
    assert.equal(table.records[0]?.notes, "kept");
  });

  it("writes an explicit Applied over an unrecognised status cell", () => {
    const table = makeTable([makeRecord({ storedStatus: "Ghosted" })]);
    const record = updateApplicationStatus(table, "J1", "Applied", undefined, NOW);
    assert.equal(record.storedStatus, undefined);
  });

  it("rejects unknown job ids", () => {
    const table = makeTable([makeRecord()]);
    assert.throws(() => updateApplicationStatus(table, "missing", "Offered"), UnknownApplicationError);
    assert.throws(() => updateApplicationStatus(table, "missing", "Offered"), { message: "Job ID 'missing' not found" });
  });
});

describe("parseTrackerDate", () => {
  it("accepts the tracker form and normalizes datetime-local input", () => {
    assert.equal(parseTrackerDate("2024-05-10 14:00:00"), "2024-05-10 14:00:00");
    assert.equal(parseTrackerDate("2024-05-10T14:00"), null);
    assert.equal(parseTrackerDate("2024-05-10T14:00", true), "2024-05-10 14:00:00");
  });

  it("refuses impossible dates and other shapes", () => {
    assert.equal(parseTrackerDate("2024-02-30 10:00:00"), null);
    assert.equal(parseTrackerDate("2024-05-10 24:00:00"), null);
    assert.equal(parseTrackerDate("2024-05-10"), null);
    assert.equal(parseTrackerDate("May 10, 2024"), null);
  });
});

describe("updateInterviewDate", () => {
  it("sets the date and schedules an application still at Applied", () => {
    const table = makeTable([makeRecord({ notes: "Applied via referral" })]);

    const record = updateInterviewDate(table, "J1", "2024-05-10 14:00:00", NOW);

    assert.equal(record.interviewDate, "2024-05-10 14:00:00");
    assert.equal(record.status, "Interview Scheduled");
    assert.equal(
      record.notes,
      "Applied via referral\n[2024-05-06 09:05] Interview date manually updated to '2024-05-10 14:00:00'\n" +
        "Status automatically updated to 'Interview Scheduled'",
    );
  });

  it("keeps a later status and clears the date on an empty value", () => {
    const table = makeTable([makeRecord({ status: "Interviewed", interviewDate: "2024-05-10 14:00:00" })]);

    const record = updateInterviewDate(table, "J1", "", NOW);

    assert.equal(record.interviewDate, "");
    assert.equal(record.status, "Interviewed");
    assert.equal(record.notes, "[2024-05-06 09:05] Interview date manually updated to ''");
  });

  it("rejects malformed dates before touching the record", () => {
    const table = makeTable([makeRecord()]);
    assert.throws(() => updateInterviewDate(table, "J1", "2024-05-10T14:00", NOW), InvalidDateError);
    assert.deepEqual(table.records[0], makeRecord());
  });
});

describe("updateDateApplied", () => {
  it("normalizes the date and records the user's note", () => {
    const table = makeTable([makeRecord()]);

    const record = updateDateApplied(table, "J1", "2024-02-28T17:45", " via careers page ", NOW);

    assert.equal(record.dateApplied, "2024-02-28 17:45:00");
    assert.equal(
      record.notes,
      "[2024-05-06 09:05] Date Applied manually updated to '2024-02-28 17:45:00'\nUser notes: via careers page",
    );
  });

  it("uses the current time for an empty value", () => {
    const table = makeTable([makeRecord()]);
    assert.equal(updateDateApplied(table, "J1", "", undefined, NOW).dateApplied, "2024-05-06 09:05:00");
  });

  it("rejects unknown job ids and bad dates", () => {
    const table = makeTable([makeRecord()]);
    assert.throws(() => updateDateApplied(table, "missing", "", undefined, NOW), UnknownApplicationError);
    assert.throws(() => updateDateApplied(table, "J1", "yesterday", undefined, NOW), {
      message: "Invalid date format. Use 'YYYY-MM-DD HH:MM:SS'",
    });
  });
});

describe("filterApplications", () => {
  const records = [
    makeRecord({ jobId: "1", company: "Acme Corp", status: "Applied" }),
    makeRecord({ jobId: "2", company: "Globex", status: "Rejected" }),
    makeRecord({ jobId: "3", company: "ACME Labs", status: "Rejected" }),
  ];

  it("filters by status and company substring", () => {
    assert.deepEqual(
      filterApplications(records, { company: "acme" }).map((record) => record.jobId),
      ["1", "3"],
    );
    assert.deepEqual(
      filterApplications(records, { status: "Rejected", company: "acme" }).map((record) => record.jobId),
      ["3"],
    );
    assert.equal(filterApplications(records, {}).length, 3);
  });
});

describe("generateApplicationStats", () => {
  it("counts statuses and the response rate", () => {
    const stats = generateApplicationStats([
      makeRecord({ status: "Applied" }),
      makeRecord({ status: "Interviewed" }),
      makeRecord({ status: "Rejected" }),
      makeRecord({ status: "Offered" }),
    ]);

    assert.equal(stats.total, 4);
    assert.equal(stats.statuses.Applied, 1);
    assert.equal(stats.statuses.Rejected, 1);
    assert.equal(stats.statuses.Declined, 0);
    assert.equal(stats.responseRate, 50);
  });

  it("reports a zero response rate for an empty store", () => {
    assert.equal(generateApplicationStats([]).responseRate, 0);
  });
});

describe("diffStatusCounts", () => {
  it("reports per-status changes", () => {
    const before = generateApplicationStats([makeRecord({ status: "Applied" }), makeRecord({ status: "Applied" })]);
    const after = generateApplicationStats([makeRecord({ status: "Applied" }), makeRecord({ status: "Rejected" })]);

    const changed = diffStatusCounts(before, after).filter((entry) => entry.change !== 0);

    assert.deepEqual(changed, [
      { status: "Applied", before: 2, after: 1, change: -1 },
      { status: "Rejected", before: 0, after: 1, change: 1 },
    ]);
  });
});
