import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ArtifactFetchError, AuthError, CorruptArchiveError, NotFoundError, TransientNetworkError } from "../errors";
import { buildIndex, buildSnapshotArchive, makeTempDir, silentLogger } from "../test/fixtures";
import { classifyHttpFailure, fetchSnapshotArchive, redactUrl } from "./fetcher";

const SOURCE_URL = "https://artifacts.test/releases/snapshot.tar.gz?sig=test-secret";

describe("classifyHttpFailure", () => {
    it.each([
        [401, AuthError],
        [403, AuthError],
        [404, NotFoundError],
        [410, NotFoundError],
        [408, TransientNetworkError],
        [429, TransientNetworkError],
        [500, TransientNetworkError],
        [503, TransientNetworkError],
        [400, ArtifactFetchError],
    ])("maps %i to %o", (status, expected) => {
        expect(classifyHttpFailure(status, "", SOURCE_URL)).toBeInstanceOf(expected);
    });

    it("never puts the query string in the message", () => {
        const error = classifyHttpFailure(401, "Unauthorized", SOURCE_URL);

        expect(error.message).toBe(
            "Snapshot download from https://artifacts.test/releases/snapshot.tar.gz failed: 401 Unauthorized"
        );
    });
});

describe("redactUrl", () => {
    it("drops credentials and query", () => {
        expect(redactUrl("https://user:pw@artifacts.test/a.tgz?token=x")).toBe("https://artifacts.test/a.tgz");
    });
});

describe("fetchSnapshotArchive", () => {
    let root: string;
    let archiveBytes: Buffer;
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(async () => {
        root = await makeTempDir();
        const archivePath = path.join(root, "fixture.tar.gz");
        await buildSnapshotArchive(archivePath, buildIndex({ documents: 2 }));
        archiveBytes = await fs.readFile(archivePath);
        await fs.rm(archivePath);

        fetchMock.mockReset();
        vi.stubGlobal("fetch", fetchMock);
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        await fs.rm(root, { recursive: true, force: true });
    });

    const options = () => ({ scratchDir: root, retries: 2, minTimeoutMs: 1, logger: silentLogger });

    it("downloads into a scratch directory and sends the token", async () => {
        fetchMock.mockImplementation(async () => new Response(archiveBytes, { status: 200 }));

        const fetched = await fetchSnapshotArchive(SOURCE_URL, { token: "test-secret" }, options());

        expect(fetched.bytes).toBe(archiveBytes.byteLength);
        expect(fetched.entries).toBe(1);
        expect(path.dirname(fetched.archivePath)).toBe(fetched.scratchDir);
        expect(path.dirname(fetched.scratchDir)).toBe(root);
        await expect(fs.readFile(fetched.archivePath)).resolves.toEqual(archiveBytes);
        expect(fetchMock).toHaveBeenCalledWith(
            SOURCE_URL,
            expect.objectContaining({
                headers: expect.objectContaining({ Authorization: "token test-secret" }),
            })
        );
    });

    it("omits the Authorization header without a token", async () => {
        fetchMock.mockImplementation(async () => new Response(archiveBytes, { status: 200 }));

        await fetchSnapshotArchive(SOURCE_URL, {}, options());

        expect(fetchMock).toHaveBeenCalledWith(
            SOURCE_URL,
            expect.objectContaining({
                headers: expect.not.objectContaining({ Authorization: expect.anything() }),
            })
        );
    });

    it.each([
        [401, AuthError],
        [403, AuthError],
        [404, NotFoundError],
    ])("fails fast on %i without retrying", async (status, expected) => {
        fetchMock.mockImplementation(async () => new Response("nope", { status }));

        await expect(fetchSnapshotArchive(SOURCE_URL, { token: "test-secret" }, options())).rejects.toBeInstanceOf(
            expected
        );
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("retries server errors with backoff and then gives up", async () => {
        fetchMock.mockImplementation(async () => new Response("busy", { status: 503 }));

        await expect(fetchSnapshotArchive(SOURCE_URL, {}, options())).rejects.toBeInstanceOf(TransientNetworkError);
        expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it("recovers when a retry succeeds", async () => {
        fetchMock
            .mockImplementationOnce(async () => {
                throw new TypeError("fetch failed");
            })
            .mockImplementation(async () => new Response(archiveBytes, { status: 200 }));

        const fetched = await fetchSnapshotArchive(SOURCE_URL, {}, options());

        expect(fetched.entries).toBe(1);
        expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    function chunkedBody(chunks: Uint8Array[], failure?: Error): ReadableStream<Uint8Array> {
        return new ReadableStream<Uint8Array>({
            start(controller) {
                for (const chunk of chunks) {
                    controller.enqueue(chunk);
                }
                if (failure) {
                    controller.error(failure);
                } else {
                    controller.close();
                }
            },
        });
    }

    it("writes a body delivered in several chunks", async () => {
        const middle = Math.floor(archiveBytes.byteLength / 2);
        fetchMock.mockImplementation(
            async () =>
                new Response(chunkedBody([archiveBytes.subarray(0, middle), archiveBytes.subarray(middle)]), {
                    status: 200,
                })
        );

        const fetched = await fetchSnapshotArchive(SOURCE_URL, {}, options());

        expect(fetched.bytes).toBe(archiveBytes.byteLength);
        await expect(fs.readFile(fetched.archivePath)).resolves.toEqual(archiveBytes);
    });

    it("retries a transfer that breaks off mid-body", async () => {
        const middle = Math.floor(archiveBytes.byteLength / 2);
        fetchMock
            .mockImplementationOnce(
                async () =>
                    new Response(chunkedBody([archiveBytes.subarray(0, middle)], new Error("socket closed")), {
                        status: 200,
                    })
            )
            .mockImplementation(async () => new Response(archiveBytes, { status: 200 }));

        const fetched = await fetchSnapshotArchive(SOURCE_URL, {}, options());

        expect(fetchMock).toHaveBeenCalledTimes(2);
        expect(fetched.bytes).toBe(archiveBytes.byteLength);
        await expect(fs.readdir(fetched.scratchDir)).resolves.toEqual(["snapshot.tar.gz"]);
    });

    it("treats an empty body as transient", async () => {
        fetchMock.mockImplementation(async () => new Response(new Uint8Array(0), { status: 200 }));

        await expect(fetchSnapshotArchive(SOURCE_URL, {}, options())).rejects.toBeInstanceOf(TransientNetworkError);
        expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it("rejects a body that is not an archive without retrying", async () => {
        fetchMock.mockImplementation(async () => new Response("x".repeat(2048), { status: 200 }));

        await expect(fetchSnapshotArchive(SOURCE_URL, {}, options())).rejects.toBeInstanceOf(CorruptArchiveError);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("removes its scratch directory on failure", async () => {
        fetchMock.mockImplementation(async () => new Response("nope", { status: 404 }));

        await expect(fetchSnapshotArchive(SOURCE_URL, {}, options())).rejects.toBeInstanceOf(NotFoundError);
        await expect(fs.readdir(root)).resolves.toEqual([]);
    });
});
