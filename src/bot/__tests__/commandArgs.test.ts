import { commandArgs, parseUserIdAndCount, parseUserIdArg } from "../commandArgs";

describe("commandArgs", () => {
  it("drops the command and collapses whitespace", () => {
    expect(commandArgs("/admin_subscribe@NutritionBot   42  3 ")).toEqual(["42", "3"]);
    expect(commandArgs("/help")).toEqual([]);
    expect(commandArgs(undefined)).toEqual([]);
  });
});

describe("parseUserIdArg", () => {
  const usage = "/admin_revoke USER_ID";

  it("accepts a single positive id", () => {
    expect(parseUserIdArg("/admin_revoke 42", usage)).toEqual({ ok: true, value: { userId: 42 } });
  });

  it("explains usage when the argument count is wrong", () => {
    expect(parseUserIdArg("/admin_revoke", usage)).toEqual({ ok: false, message: "Usage: /admin_revoke USER_ID" });
    expect(parseUserIdArg("/admin_revoke 1 2", usage)).toEqual({ ok: false, message: "Usage: /admin_revoke USER_ID" });
  });

  it("rejects ids that are not positive whole numbers", () => {
    const message = "User id must be a positive whole number. Usage: /admin_revoke USER_ID";
    expect(parseUserIdArg("/admin_revoke abc", usage)).toEqual({ ok: false, message });
    expect(parseUserIdArg("/admin_revoke -5", usage)).toEqual({ ok: false, message });
    expect(parseUserIdArg("/admin_revoke 0", usage)).toEqual({ ok: false, message });
  });
});

describe("parseUserIdAndCount", () => {
  const options = { usage: "/admin_subscribe USER_ID MONTHS", label: "Months", min: 1, max: 12 };

  it("accepts an id and a count inside the range", () => {
    expect(parseUserIdAndCount("/admin_subscribe 42 12", options)).toEqual({ ok: true, value: { userId: 42, count: 12 } });
  });

  it("rejects counts outside the range", () => {
    const message = "Months must be between 1 and 12.";
    expect(parseUserIdAndCount("/admin_subscribe 42 0", options)).toEqual({ ok: false, message });
    expect(parseUserIdAndCount("/admin_subscribe 42 13", options)).toEqual({ ok: false, message });
    expect(parseUserIdAndCount("/admin_subscribe 42 1.5", options)).toEqual({ ok: false, message });
  });

  it("checks the id before the count", () => {
    expect(parseUserIdAndCount("/admin_subscribe x 13", options)).toEqual({
      ok: false,
      message: "User id must be a positive whole number. Usage: /admin_subscribe USER_ID MONTHS"
    });
  });
});
