export interface Point {
    readonly x: number;
    readonly y: number;
}

export interface ComponentSize {
    width: number;
    height: number;
}

export interface Margin {
    readonly left: number;
    readonly right: number;
    readonly top: number;
    readonly bottom: number;
}

export interface Rect {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}

/**
 * A single wildfire. `year` is negative for BC, positive for AD.
 */
export interface FireRecord {
    readonly year: number;
    readonly county: string;
    readonly acreage: number;
    readonly cause: string;
    readonly structuresDestroyed: number;
}

/**
 * One year's fire statistics. `topFive` always holds five records,
 * largest acreage first.
 */
export interface FireSeason {
    readonly year: number;
    readonly fireCount: number;
    readonly acreage: number;
    readonly topFive: readonly FireRecord[];
}

export type SeasonMap = Map<number, FireSeason>;

export type Rgb = readonly [number, number, number];

export interface FontSpec {
    readonly family: string;
    readonly size: number;
    readonly bold: boolean;
}

// Pixel offsets from the map image's top-left corner, as [x, y]
export type CountyOffsets = Readonly<Record<string, readonly number[]>>;
