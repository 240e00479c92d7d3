import request from "supertest";

const mockLoggerWarn = jest.fn();

jest.mock("../../utils/logger", () => ({
    logger: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: (...args: unknown[]) => mockLoggerWarn(...args),
        error: jest.fn(),
    },
}));

import router from "../library";
import { musicLibrary } from "../../services/musicLibrary";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

const app = createRouteTestApp("/api/library", router);

const sparseTrack = {
    id: "t1",
    title: "Night Drive",
    artist: "Nova",
};

const fullTrack = {
    id: "t2",
    title: "Harbor Lights",
    artist: "Orbit",
    bpm: 124,
    key: "Am",
    camelotPosition: "8A",
    energyLevel: 0.7,
    timeSignature: "4/4",
    genres: [" deep house ", ""],
};

describe("library routes", () => {
    beforeEach(() => {
        musicLibrary.clear();
    });

    it("adds a single track and fills in missing metadata", async () => {
        const res = await request(app).post("/api/library/tracks").send(sparseTrack);

        expect(res.status).toBe(201);
        expect(res.body).toEqual({ added: 1, skipped: 0, total: 1 });
        expect(musicLibrary.getTrack("t1")).toEqual({
            id: "t1",
            title: "Night Drive",
            artist: "Nova",
            bpm: 0,
            key: "Unknown",
            camelotPosition: "Unknown",
            energyLevel: 0,
            timeSignature: "4/4",
            genres: [],
        });
    });

    it("adds a batch, trims genres and reports duplicates", async () => {
        await request(app).post("/api/library/tracks").send(sparseTrack);

        const res = await request(app)
            .post("/api/library/tracks")
            .send([fullTrack, sparseTrack]);

        expect(res.status).toBe(201);
        expect(res.body).toEqual({ added: 1, skipped: 1, total: 2 });
        expect(musicLibrary.getTrack("t2")?.genres).toEqual(["deep house"]);
    });

    it("answers 200 when every track was already present", async () => {
        await request(app).post("/api/library/tracks").send(sparseTrack);

        const res = await request(app).post("/api/library/tracks").send(sparseTrack);

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ added: 0, skipped: 1, total: 1 });
    });

    it("rejects invalid track payloads with field details", async () => {
        const res = await request(app)
            .post("/api/library/tracks")
            .send({ id: "t3", title: "No Artist", bpm: -4 });

        expect(res.status).toBe(400);
        expect(res.body.error).toBe("Invalid track payload");
        expect(musicLibrary.size).toBe(0);
    });

    it("lists, fetches and deletes tracks", async () => {
        await request(app).post("/api/library/tracks").send([sparseTrack, fullTrack]);

        const list = await request(app).get("/api/library/tracks");
        expect(list.status).toBe(200);
        expect(list.body.total).toBe(2);
        expect(list.body.tracks.map((track: { id: string }) => track.id)).toEqual([
            "t1",
            "t2",
        ]);

        const single = await request(app).get("/api/library/tracks/t2");
        expect(single.status).toBe(200);
        expect(single.body.track.bpm).toBe(124);

        const removed = await request(app).delete("/api/library/tracks/t1");
        expect(removed.status).toBe(204);

        const missing = await request(app).get("/api/library/tracks/t1");
        expect(missing.status).toBe(404);
        expect(missing.body).toEqual({ error: "Track not found" });

        const removedAgain = await request(app).delete("/api/library/tracks/t1");
        expect(removedAgain.status).toBe(404);
    });

    it("clears the whole library", async () => {
        await request(app).post("/api/library/tracks").send([sparseTrack, fullTrack]);

        const res = await request(app).delete("/api/library/tracks");

        expect(res.status).toBe(204);
        expect(musicLibrary.size).toBe(0);
    });

    it("summarises the library", async () => {
        await request(app).post("/api/library/tracks").send([sparseTrack, fullTrack]);

        const res = await request(app).get("/api/library/stats");

        expect(res.status).toBe(200);
        expect(res.body.trackCount).toBe(2);
        expect(res.body.bpm).toEqual({ average: 124, min: 124, max: 124 });
        expect(res.body.commonCamelotPositions).toEqual([{ value: "8A", count: 1 }]);
        expect(res.body.timeSignatures).toEqual([
            { value: "4/4", count: 2, percentage: 100 },
        ]);
    });

    it("patches missing metadata from contributions", async () => {
        await request(app).post("/api/library/tracks").send([sparseTrack, fullTrack]);

        const res = await request(app)
            .post("/api/library/contributions")
            .send({
                contributions: [
                    { trackId: "t1", bpm: 98, camelotKey: "4B", genreKeywords: ["soul"] },
                    { trackId: "t2", bpm: 60 },
                    { trackId: "" },
                ],
            });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ accepted: 2, patched: 2 });
        expect(musicLibrary.getTrack("t1")).toMatchObject({
            bpm: 98,
            camelotPosition: "4B",
            genres: ["soul"],
        });
        expect(musicLibrary.getTrack("t2")?.bpm).toBe(124);
        expect(mockLoggerWarn).toHaveBeenCalledTimes(1);
    });

    it("rejects a contributions body without a list", async () => {
        const res = await request(app)
            .post("/api/library/contributions")
            .send({ contributions: "t1" });

        expect(res.status).toBe(400);
        expect(res.body.error).toBe("Invalid contributions payload");
        expect(res.body.details).toEqual([
            { path: "contributions", message: "Expected array, received string" },
        ]);
    });
});
