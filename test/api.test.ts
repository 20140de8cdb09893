import {
  compareString,
  create,
  destroy,
  get,
  hashString,
  insert,
  remove,
} from "../src/index.js";
import { test, expect } from "@jest/globals";
import { unwrap } from "./helpers.js";

test("free-function API drives a table through its lifecycle", () => {
  let freed = 0;
  const table = unwrap(
    create<string, string>(2, hashString, compareString, {
      freeValue: () => {
        freed++;
      },
    })
  );

  unwrap(insert(table, "hello", "world"));
  unwrap(insert(table, "world", "hello"));
  unwrap(insert(table, "hello", "goodbye"));
  expect(freed).toEqual(1);

  expect(get(table, "hello")).toEqual("goodbye");
  expect(get(table, "world")).toEqual("hello");

  unwrap(remove(table, "world"));
  expect(get(table, "world")).toBeUndefined();
  expect(freed).toEqual(2);

  const missing = remove(table, "world");
  expect(missing.ok).toEqual(false);
  if (!missing.ok) expect(missing.error.kind).toEqual("NotFound");

  destroy(table);
  expect(freed).toEqual(3);
  expect(table.state).toEqual("destroyed");
});

test("mutating without a table is an invalid argument", () => {
  const inserted = insert<string, string>(null, "k", "v");
  const removed = remove<string, string>(undefined, "k");

  expect(inserted.ok).toEqual(false);
  if (!inserted.ok) expect(inserted.error.kind).toEqual("InvalidArgument");
  expect(removed.ok).toEqual(false);
  if (!removed.ok) expect(removed.error.kind).toEqual("InvalidArgument");
});
