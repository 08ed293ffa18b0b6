import { describe, it, expect } from "vitest";
import { InvalidFormUpdateError } from "../../../domain/errors.js";
import { toFormColumns } from "../../../services/form-repository.js";

describe("toFormColumns", () => {
  it("should map each typed variant to its column", () => {
    expect(toFormColumns({ kind: "title", value: "T" })).toEqual({ title: "T" });
    expect(toFormColumns({ kind: "description", value: "D" })).toEqual({ description: "D" });
    expect(toFormColumns({ kind: "author", value: "A" })).toEqual({ author: "A" });
    expect(toFormColumns({ kind: "closed", value: false })).toEqual({ closed: false });
  });

  it("should pass through a valid column map", () => {
    expect(toFormColumns({ kind: "fields", values: { title: "T", closed: true } })).toEqual({
      title: "T",
      closed: true,
    });
  });

  it("should refuse immutable and unknown columns", () => {
    expect(() => toFormColumns({ kind: "fields", values: { id: "f2" } })).toThrow(InvalidFormUpdateError);
    expect(() => toFormColumns({ kind: "fields", values: { createdAt: "2024-01-01" } })).toThrow(
      "invalid form update: Unrecognized key(s) in object: 'createdAt'"
    );
  });

  it("should refuse a mistyped column", () => {
    expect(() => toFormColumns({ kind: "fields", values: { closed: "yes" } })).toThrow(
      "invalid form update: closed: Expected boolean, received string"
    );
  });

  it("should refuse an empty column map", () => {
    expect(() => toFormColumns({ kind: "fields", values: {} })).toThrow("invalid form update: no columns to update");
  });
});
