import {
    deriveItemIdentity,
    formatContentRef,
    normalizeReleaseTitle,
    type QueueItem,
} from "../queueItem";

function makeItem(overrides: Partial<QueueItem> = {}): QueueItem {
    return {
        id: 101,
        origin: "sonarr",
        title: "Show.Name.S01E02.720p.HDTV-GRP",
        status: "downloading",
        size: 100,
        sizeLeft: 100,
        contentRef: { kind: "episode", episodeId: 55, seriesId: 9 },
        ...overrides,
    };
}

describe("queueItem", () => {
    it("normalizes release titles to dotted lowercase tokens", () => {
        expect(normalizeReleaseTitle("  Show Name - S01E02 [720p] ")).toBe(
            "show.name.s01e02.720p"
        );
        expect(normalizeReleaseTitle("Show.Name.S01E02.720p")).toBe(
            "show.name.s01e02.720p"
        );
    });

    it("formats content references", () => {
        expect(formatContentRef({ kind: "movie", movieId: 3 })).toBe("movie:3");
        expect(formatContentRef({ kind: "episode", episodeId: 4, seriesId: 1 })).toBe(
            "episode:4"
        );
        expect(formatContentRef({ kind: "series", seriesId: 8 })).toBe("series:8");
        expect(formatContentRef(undefined)).toBe("-");
    });

    it("builds identity from origin, content and title, never the queue id", () => {
        const first = makeItem();
        const recycled = makeItem({ id: 202 });

        expect(deriveItemIdentity(first)).toBe(
            "sonarr|episode:55|show.name.s01e02.720p.hdtv.grp"
        );
        expect(deriveItemIdentity(recycled)).toBe(deriveItemIdentity(first));
    });

    it("separates identical titles that belong to different content", () => {
        const a = makeItem();
        const b = makeItem({ contentRef: { kind: "episode", episodeId: 56 } });

        expect(deriveItemIdentity(a)).not.toBe(deriveItemIdentity(b));
    });

    it("keeps non-Latin titles distinct", () => {
        expect(normalizeReleaseTitle("映画の一 (2024)")).toBe("映画の一.2024");

        const first = makeItem({ origin: "radarr", title: "映画の一", contentRef: undefined });
        const second = makeItem({ origin: "radarr", title: "ドラマ二", contentRef: undefined });

        expect(deriveItemIdentity(first)).toBe("radarr|-|映画の一");
        expect(deriveItemIdentity(second)).toBe("radarr|-|ドラマ二");
    });

    it("falls back to the download id when the title has no letters or digits", () => {
        const item = makeItem({
            origin: "radarr",
            title: "!!! ---",
            downloadId: " ABC123 ",
            contentRef: undefined,
        });

        expect(deriveItemIdentity(item)).toBe("radarr|-|download:abc123");
        expect(deriveItemIdentity({ ...item, downloadId: undefined })).toBe("radarr|-|");
    });
});
