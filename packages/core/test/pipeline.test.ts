import { mkdtempSync, rmSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { PipelinePhase, ReadErrors } from "@casetable/constants";
import { createLogger } from "@casetable/logger";
import { resolveDialect } from "@casetable/parser";
import { ExtractPipeline } from "../src/pipeline";

const SOURCE = `package demo

import "testing"

func TestLogic(t *testing.T) {
	tests := []struct {
		name       string
		cql        string
		wantResult result.Value
	}{
		{name: "And", cql: "true and false", wantResult: newOrFatal(t, false)},
		{name: "Or", cql: "true or false", wantResult: newOrFatal(t, true)},
	}
	_ = tests
}

func TestStrings(t *testing.T) {
	tests := []struct {
		name       string
		cql        string
		wantResult result.Value
	}{
		{name: "Upper", cql: "Upper('a')", wantResult: newOrFatal(t, "A")},
	}
	_ = tests
}
`;

describe("ExtractPipeline", () => {
    let testDir: string;
    const pipeline = new ExtractPipeline();
    const logger = createLogger("test", "silent");

    beforeAll(async () => {
        testDir = mkdtempSync(join(tmpdir(), "casetable-core-"));
        await writeFile(join(testDir, "logic_test.go"), SOURCE);
        await writeFile(join(testDir, "empty_test.go"), "package demo\n");
        await writeFile(join(testDir, "big_test.go"), "x".repeat(2048));
    });

    afterAll(() => {
        rmSync(testDir, { recursive: true, force: true });
    });

    describe("Feature: Extraction", () => {
        it("should extract documents named after the input file", async () => {
            const result = await pipeline.run({ paths: [join(testDir, "logic_test.go")] }, logger);

            expect(result.errors).toEqual([]);
            expect(result.files).toHaveLength(1);
            expect(result.files[0]?.document).toEqual({
                source: "logic_test.go",
                functions: {
                    TestLogic: [
                        { name: "And", cql: "true and false", expected: false },
                        { name: "Or", cql: "true or false", expected: true },
                    ],
                    TestStrings: [{ name: "Upper", cql: "Upper('a')", expected: "A" }],
                },
            });
            expect(result.stats).toEqual({
                filesRead: 1,
                functionsExtracted: 2,
                testsExtracted: 3,
                errorsCount: 0,
            });
        });

        it("should report a file without tests as read with zero counts", async () => {
            const result = await pipeline.run({ paths: [join(testDir, "empty_test.go")] }, logger);

            expect(result.errors).toEqual([]);
            expect(result.files[0]?.counts).toEqual({ tests: 0, functions: 0 });
            expect(result.files[0]?.document).toEqual({ source: "empty_test.go", functions: {} });
        });

        it("should apply the configured dialect", async () => {
            const result = await pipeline.run(
                {
                    paths: [join(testDir, "logic_test.go")],
                    dialect: resolveDialect({ functionPrefix: "TestStr" }),
                },
                logger,
            );

            expect(Object.keys(result.files[0]?.document.functions ?? {})).toEqual(["TestStrings"]);
        });
    });

    describe("Feature: Read Errors", () => {
        it("should collect a missing file and continue with the next", async () => {
            const missing = join(testDir, "missing_test.go");
            const result = await pipeline.run({ paths: [missing, join(testDir, "logic_test.go")] }, logger);

            expect(result.files).toHaveLength(1);
            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]).toMatchObject({
                phase: PipelinePhase.READ,
                path: missing,
                code: "ENOENT",
                userMessage: [`Failed to read "${missing}"`, ReadErrors.PATH_NOT_FOUND[0]],
            });
            expect(result.stats.errorsCount).toBe(1);
        });

        it("should reject a directory", async () => {
            const result = await pipeline.run({ paths: [testDir] }, logger);

            expect(result.errors[0]?.code).toBe("ENOTFILE");
            expect(result.files).toEqual([]);
        });

        it("should skip files over the size limit", async () => {
            const result = await pipeline.run({ paths: [join(testDir, "big_test.go")], maxFileSizeMb: 0.001 }, logger);

            expect(result.errors[0]?.code).toBe("EFBIG");
            expect(result.errors[0]?.userMessage).toEqual([
                `Failed to read "${join(testDir, "big_test.go")}"`,
                "File exceeds the configured size limit",
            ]);
        });
    });
});
