import { formatTable } from "../../src/cli/utils/printTable";

describe("formatTable", () => {
  test("pads columns to the widest cell", () => {
    const table = formatTable(
      ["NAME", "KIND"],
      [
        ["add", "in-process"],
        ["echo", "x"],
      ]
    );

    expect(table.split("\n")).toEqual([
      "NAME │ KIND",
      "─".repeat(4) + "─┼─" + "─".repeat(10),
      "add  │ in-process",
      "echo │ x",
    ]);
  });

  test("ignores color codes when measuring", () => {
    const table = formatTable(["ST"], [["\u001b[32mok\u001b[0m"]]);
    expect(table.split("\n")[1]).toBe("──");
  });

  test("says so when there is nothing to show", () => {
    expect(formatTable(["NAME"], [])).toBe("No data to display");
  });
});
