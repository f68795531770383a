import {
  DELETE_POST_FIELDS,
  validateDeletePost,
  validateNewPost,
  validatePostRequest,
} from "@server/lib/validation";
import { describe, expect, it } from "vitest";

describe("validatePostRequest", () => {
  it("accepts the new post fields", () => {
    expect(
      validatePostRequest({
        read_status: "finished",
        title: "Dune",
        "switch-uid": "isbn",
        tz_offset: "0",
      }),
    ).toBe(true);
  });

  it("rejects any field outside the allow-list", () => {
    expect(validatePostRequest({ title: "Dune", user_id: "2" })).toBe(false);
  });

  it("checks against a custom allow-list", () => {
    const data = { id: "1", confirm_delete: "yes", mp_delete: "yes" };
    expect(validatePostRequest(data, DELETE_POST_FIELDS)).toBe(true);
    expect(validatePostRequest(data)).toBe(false);
  });
});

describe("validateNewPost", () => {
  it("returns no errors for a valid post", () => {
    expect(
      validateNewPost({
        read_status: "finished",
        title: "Dune",
        isbn: "0441013597",
        published: "2024-05-01T09:30",
      }),
    ).toEqual([]);
  });

  it("requires read status and title", () => {
    expect(validateNewPost({})).toEqual([
      "Please select the Read Status",
      "Please enter the Title",
    ]);
  });

  it("collects every error at once", () => {
    expect(
      validateNewPost({
        read_status: "",
        title: "   ",
        isbn: "12345",
        published: "2024-02-30T10:00",
      }),
    ).toEqual([
      "Please select the Read Status",
      "Please enter the Title",
      "The ISBN entered appears to be invalid",
      "The Published datetime appears to be invalid",
    ]);
  });

  it("rejects an unknown read status", () => {
    expect(validateNewPost({ read_status: "skimmed", title: "Dune" })).toEqual(
      ["Please select the Read Status"],
    );
  });

  it("rejects an ISBN with extra characters", () => {
    expect(
      validateNewPost({
        read_status: "reading",
        title: "Dune",
        isbn: "ISBN 0441013597",
      }),
    ).toEqual(["The ISBN entered appears to be invalid"]);
  });

  it("rejects a published value that carries its own offset", () => {
    expect(
      validateNewPost({
        read_status: "finished",
        title: "Dune",
        published: "2024-05-01T09:30:00+02:00",
      }),
    ).toEqual(["The Published datetime appears to be invalid"]);
  });

  it("rejects a published value that is not a datetime", () => {
    expect(
      validateNewPost({
        read_status: "reading",
        title: "Dune",
        published: "yesterday",
      }),
    ).toEqual(["The Published datetime appears to be invalid"]);
  });
});

describe("validateDeletePost", () => {
  it("accepts an explicit confirmation", () => {
    expect(validateDeletePost({ id: "1", confirm_delete: "yes" })).toEqual([]);
  });

  it("requires the confirmation", () => {
    const message = "Please check the box to confirm deletion";
    expect(validateDeletePost({ id: "1" })).toEqual([message]);
    expect(validateDeletePost({ id: "1", confirm_delete: "no" })).toEqual([
      message,
    ]);
  });
});
