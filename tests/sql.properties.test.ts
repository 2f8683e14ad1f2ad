import { expect, test, describe, beforeEach } from "vitest";
import { Database, STANDARD_OPTIONS, type Row } from "../lib/sql";
import { seedPeople } from "./helpers/seed";

// Seeded fake data; STANDARD_OPTIONS so an emptied table still reads as []
describe("SQL Engine - properties over seeded data", () => {
  let db: Database;
  let people: Row[];

  beforeEach(() => {
    db = new Database(STANDARD_OPTIONS);
    people = seedPeople(db, 40);
  });

  test("Round trip: every inserted row comes back unchanged", () => {
    expect(db.execute("SELECT * FROM people")).toEqual(people);
  });

  test("Idempotence: repeated SELECTs return the same rows", () => {
    const sql = "SELECT name, age FROM people WHERE status = 'active' ORDER BY age";

    expect(db.execute(sql)).toEqual(db.execute(sql));
  });

  test("ORDER BY: non-decreasing text with ties in insertion order", () => {
    const rows = db.execute("SELECT id, age FROM people ORDER BY age") ?? [];

    expect(rows).toHaveLength(people.length);
    for (let i = 1; i < rows.length; i++) {
      const previous = rows[i - 1];
      const current = rows[i];
      expect(previous.age <= current.age).toBe(true);
      if (previous.age === current.age) {
        expect(Number(previous.id)).toBeLessThan(Number(current.id));
      }
    }
  });

  test("DELETE: exactly the matching rows are removed", () => {
    db.execute("DELETE FROM people WHERE age < 40");

    const remaining = db.execute("SELECT * FROM people") ?? [];
    expect(remaining).toEqual(people.filter((row) => !(row.age < "40")));
    expect(remaining.every((row) => row.age >= "40")).toBe(true);
  });

  test("UPDATE: only matching rows change", () => {
    db.execute("UPDATE people SET status = 'archived' WHERE status = 'active'");

    const expected = people.map((row) =>
      row.status === "'active'" ? { ...row, status: "'archived'" } : row,
    );
    expect(db.execute("SELECT * FROM people")).toEqual(expected);
  });

  test("DELETE without WHERE empties the table", () => {
    db.execute("DELETE FROM people");

    expect(db.execute("SELECT * FROM people")).toEqual([]);
    expect(db.getSchema().tables.people.rowCount).toBe(0);
  });
});
