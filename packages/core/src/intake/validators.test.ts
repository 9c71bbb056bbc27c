import { describe, expect, it } from "vitest";
import {
  acceptPhone,
  composePosition,
  isValidExperience,
  isValidName,
  isValidRefinement,
  stripLeadingIcon,
} from "./validators";

describe("intake validators", () => {
  it("requires at least two name tokens and five characters", () => {
    expect(isValidName("Ali")).toBe(false);
    expect(isValidName("Ali Vo")).toBe(true);
    expect(isValidName("  Aziza   Karimova  ")).toBe(true);
    expect(isValidName("A B")).toBe(false);
  });

  it("prefers a shared contact over typed text", () => {
    expect(acceptPhone("", "+998901234567")).toBe("+998901234567");
    expect(acceptPhone("hello", "998901234567")).toBe("998901234567");
  });

  it("accepts typed numbers with 9 to 15 digits and keeps the trimmed text", () => {
    expect(acceptPhone(" +998 (90) 123-45-67 ", null)).toBe("+998 (90) 123-45-67");
    expect(acceptPhone("90 123 45 6", null)).toBe("90 123 45 6");
    expect(acceptPhone("12345678", null)).toBeNull();
    expect(acceptPhone("1234567890123456", null)).toBeNull();
    expect(acceptPhone("call me", null)).toBeNull();
  });

  it("checks minimum lengths for refinement and experience", () => {
    expect(isValidRefinement("ab")).toBe(false);
    expect(isValidRefinement(" Art ")).toBe(true);
    expect(isValidExperience("5 yrs")).toBe(false);
    expect(isValidExperience("5 years")).toBe(true);
  });

  it("strips one leading icon token", () => {
    expect(stripLeadingIcon("🏢 Management")).toBe("Management");
    expect(stripLeadingIcon("👨‍🏫 Teacher")).toBe("Teacher");
    expect(stripLeadingIcon("Management")).toBe("Management");
  });

  it("composes the stored position from category and refinement", () => {
    expect(composePosition("👨‍🏫 Teacher", " Math teacher ", "en")).toBe("Teacher (Math teacher)");
    expect(composePosition("💡 Other position", "Driver", "en")).toBe("Driver");
    expect(composePosition("💡 Boshqa lavozim", "Driver", "en")).toBe("Driver");
    expect(composePosition("Cook", "Head cook", "en")).toBe("Cook (Head cook)");
  });
});
