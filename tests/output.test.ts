import assert from "node:assert/strict";
import test from "node:test";

import {
  CEST_OFFSET_MINUTES,
  ENGLISH_DIALECT,
  EUROPEAN_DIALECT,
  controlsText,
  csvPathFor,
  formatCivilTime,
  splitTimesText,
  toCSV,
  toText,
} from "../src/output";
import type { CompetitorResult } from "../src/types";

const competitors: CompetitorResult[] = [
  {
    name: "Carl Dahl",
    team: "Forest OK",
    time: 1200,
    startTime: new Date("2021-07-10T09:15:30+00:00"),
    position: 1,
    status: "OK",
    splitTimes: [
      { controlCode: 32, time: 90 },
      { controlCode: 31, time: 120 },
    ],
  },
  {
    name: "Anna Berg",
    team: "",
    status: "DidNotFinish",
    splitTimes: [],
  },
];

const HEADER_EN =
  '"Position","Name","Team","Time","Status","Controls","Split Times","Start Date","Start Time"';

test("toCSV quotes every field and ends each row with CRLF", () => {
  const csv = toCSV(competitors, {
    dialect: ENGLISH_DIALECT,
    utcOffsetMinutes: CEST_OFFSET_MINUTES,
  });

  assert.equal(
    csv,
    HEADER_EN +
      "\r\n" +
      '"1","Carl Dahl","Forest OK","1200","OK","32, 31","32: 90, 31: 120","2021-07-10","11:15:30"\r\n' +
      '"","Anna Berg","","","DidNotFinish","","","",""\r\n',
  );
});

test("toCSV dialects differ only in the delimiter", () => {
  const en = toCSV(competitors, {
    dialect: ENGLISH_DIALECT,
    utcOffsetMinutes: CEST_OFFSET_MINUTES,
  });
  const eu = toCSV(competitors, {
    dialect: EUROPEAN_DIALECT,
    utcOffsetMinutes: CEST_OFFSET_MINUTES,
  });

  assert.ok(eu.startsWith('"Position";"Name";"Team";'));
  assert.equal(eu.split('";"').join('","'), en);
});

test("toCSV writes only the header for an empty class", () => {
  const csv = toCSV([], {
    dialect: EUROPEAN_DIALECT,
    utcOffsetMinutes: CEST_OFFSET_MINUTES,
  });

  assert.equal(
    csv,
    '"Position";"Name";"Team";"Time";"Status";"Controls";"Split Times";"Start Date";"Start Time"\r\n',
  );
});

test("toCSV doubles embedded quotes", () => {
  const csv = toCSV(
    [{ name: 'Eva "Fox" Lind', team: "", status: "OK", splitTimes: [] }],
    { dialect: ENGLISH_DIALECT, utcOffsetMinutes: CEST_OFFSET_MINUTES },
  );

  assert.equal(
    csv.split("\r\n")[1],
    '"","Eva ""Fox"" Lind","","","OK","","","",""',
  );
});

test("toText renders absent values as an empty string", () => {
  assert.equal(toText(undefined), "");
  assert.equal(toText(0), "0");
  assert.equal(toText(517), "517");
});

test("split columns render absent values as empty strings", () => {
  const splits = [{ controlCode: 32 }, { controlCode: 31, time: 150 }];

  assert.equal(controlsText(splits), "32, 31");
  assert.equal(splitTimesText(splits), "32: , 31: 150");
});

test("formatCivilTime uses a fixed offset regardless of season", () => {
  assert.deepEqual(
    formatCivilTime(new Date("2021-12-31T23:30:00Z"), CEST_OFFSET_MINUTES),
    ["2022-01-01", "01:30:00"],
  );
  assert.deepEqual(formatCivilTime(new Date("2021-07-10T09:15:30.750Z"), 0), [
    "2021-07-10",
    "09:15:30",
  ]);
});

test("csvPathFor replaces the extension", () => {
  assert.equal(csvPathFor("results/h21.xml"), "results/h21.csv");
  assert.equal(csvPathFor("a.b/file.XML"), "a.b/file.csv");
  assert.equal(csvPathFor("results/h21"), "results/h21.csv");
});
