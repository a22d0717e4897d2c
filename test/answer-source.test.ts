import { beforeEach, describe, expect, it, vi } from "vitest";

const clack = vi.hoisted(() => ({
  text: vi.fn(),
  select: vi.fn(),
  confirm: vi.fn(),
  log: { warn: vi.fn() },
  isCancel: () => false,
  cancel: vi.fn()
}));

vi.mock("@clack/prompts", () => clack);

import { ClackAnswerSource } from "../src/core/prompts.js";

describe("ClackAnswerSource", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("shows the default as a placeholder and returns empty input as an empty string", async () => {
    clack.text.mockResolvedValueOnce(undefined);
    const answer = await new ClackAnswerSource().text({ message: "Version", defaultValue: "1.0.0" });

    expect(answer).toBe("");
    expect(clack.text).toHaveBeenCalledWith({ message: "Version", placeholder: "1.0.0" });
  });

  it("offers options by index", async () => {
    clack.select.mockResolvedValueOnce(2);
    const index = await new ClackAnswerSource().select({
      message: "ABI",
      options: ["None", "WASI", "Emscripten"],
      initialIndex: 0
    });

    expect(index).toBe(2);
    expect(clack.select).toHaveBeenCalledWith({
      message: "ABI",
      initialValue: 0,
      options: [
        { value: 0, label: "None" },
        { value: 1, label: "WASI" },
        { value: 2, label: "Emscripten" }
      ]
    });
  });

  it("forwards confirmations and rejection messages", async () => {
    clack.confirm.mockResolvedValueOnce(false);
    const source = new ClackAnswerSource();

    await expect(source.confirm({ message: "Is this OK?", initialValue: true })).resolves.toBe(false);
    source.reject("Name cannot be empty.");
    expect(clack.log.warn).toHaveBeenCalledWith("Name cannot be empty.");
  });
});
