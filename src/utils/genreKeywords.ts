/**
 * Broad genre families used for loose genre matching. A tag belongs to a
 * family when its lower-cased text contains the keyword.
 */
export const BROAD_GENRE_KEYWORDS = [
    "ambient",
    "techno",
    "house",
    "trance",
    "drum and bass",
    "dubstep",
    "electronic",
    "rock",
    "metal",
    "punk",
    "jazz",
    "blues",
    "soul",
    "funk",
    "hip hop",
    "rap",
    "pop",
    "classical",
    "folk",
    "country",
    "reggae",
    "disco",
] as const;

export type BroadGenreKeyword = (typeof BROAD_GENRE_KEYWORDS)[number];

export function normalizeGenreTag(tag: string): string {
    return tag.trim().toLowerCase();
}

export function extractGenreKeywords(tag: string): BroadGenreKeyword[] {
    const normalized = normalizeGenreTag(tag);
    return BROAD_GENRE_KEYWORDS.filter((keyword) =>
        normalized.includes(keyword)
    );
}
