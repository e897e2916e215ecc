import { describe, expect, it } from "vitest";
import { groupDuplicateProfiles } from "../../src/commands/profiles/groupDuplicates";
import { runCommand } from "../../src/process/runCommand";
import { parseValues } from "../../src/store/regExeStore";

// Writes argv[1] (hex) to stdout, one byte first and the rest on a later tick.
const WRITE_HEX = [
  "const bytes = Buffer.from(process.argv[1], 'hex');",
  "process.stdout.write(bytes.subarray(0, 1));",
  "setTimeout(() => process.stdout.write(bytes.subarray(1)), 20);",
].join(" ");

function profileLine(tail: number): string {
  return Buffer.concat([
    Buffer.from("    ProfileImagePath    REG_EXPAND_SZ    C:\\Users\\Jos", "latin1"),
    Buffer.from([tail]),
  ]).toString("hex");
}

describe("runCommand", () => {
  it("decodes OEM code page output so distinct accented paths stay distinct", async () => {
    const acute = await runCommand(process.execPath, ["-e", WRITE_HEX, profileLine(0x82)], { encoding: "cp850" });
    const grave = await runCommand(process.execPath, ["-e", WRITE_HEX, profileLine(0x8a)], { encoding: "cp850" });

    expect(acute.status).toBe(0);
    const acutePath = parseValues(acute.stdout).ProfileImagePath;
    const gravePath = parseValues(grave.stdout).ProfileImagePath;
    expect(acutePath).toBe("C:\\Users\\José");
    expect(gravePath).toBe("C:\\Users\\Josè");

    const groups = groupDuplicateProfiles([
      { identity: "S-1-5-21-100-1001", imagePath: acutePath, location: "HKLM\\ProfileList\\S-1-5-21-100-1001" },
      { identity: "S-1-5-21-200-1001", imagePath: gravePath, location: "HKLM\\ProfileList\\S-1-5-21-200-1001" },
    ]);
    expect(groups).toEqual([]);
  });

  it("decodes a multibyte character split across output chunks", async () => {
    const result = await runCommand(process.execPath, ["-e", WRITE_HEX, Buffer.from("é", "utf8").toString("hex")]);

    expect(result.stdout).toBe("é");
  });

  it("reports the exit status and start failures", async () => {
    const exited = await runCommand(process.execPath, ["-e", "process.exit(3)"]);
    expect(exited.status).toBe(3);

    const missing = await runCommand("profile-dedupe-no-such-tool", []);
    expect(missing.status).toBeNull();
    expect(missing.spawnError?.code).toBe("ENOENT");
  });
});
