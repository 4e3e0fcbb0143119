import { mkdirSync, mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { crossMapDirectory, loadCrossMapFile, StaticCrossMap } from "./crossmap";
import { MissingSource } from "../errors";

test("static lookup returns copies in stored order", () => {
    const cm = new StaticCrossMap({ A: ["1", "2"] });
    const out = cm.map("A");
    out.push("mutated");
    expect(cm.map("A")).toEqual(["1", "2"]);
    expect(cm.map("B")).toEqual([]);
});

test("pair files fan out in file order", async () => {
    const dir = mkdtempSync(join(tmpdir(), "crossmap-"));
    writeFileSync(
        join(dir, "NDC_to_ATC.csv"),
        "source_code,target_code\n0001,A01\n0002,B02\n0001,A02\n",
    );
    const cm = await loadCrossMapFile(dir, "NDC", "ATC");
    expect(cm.map("0001")).toEqual(["A01", "A02"]);

    const factory = crossMapDirectory(dir);
    const viaFactory = await factory("NDC", "ATC");
    expect(await viaFactory.map("0002", {}, {})).toEqual(["B02"]);
    await expect(loadCrossMapFile(dir, "ICD9", "ICD10")).rejects.toBeInstanceOf(MissingSource);
});

test("read failures other than a missing file are not MissingSource", async () => {
    const dir = mkdtempSync(join(tmpdir(), "crossmap-"));
    mkdirSync(join(dir, "ICD9_to_ICD10.csv"));
    const err = await loadCrossMapFile(dir, "ICD9", "ICD10").catch((e: unknown) => e);
    expect(err).not.toBeInstanceOf(MissingSource);
    expect(err).toMatchObject({ code: "EISDIR" });
});
