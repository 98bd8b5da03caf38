// Tag (leading '~' stripped) to raw value, as read from a .meta file
export type MetaRecord = ReadonlyMap<string, string>;

export interface ChannelCounts {
    ap: number;
    lf: number;
    sy: number;
}

/**
 * Physical layout constants of one probe model. Distances in um.
 */
export interface GeometryParams {
    shankCount: number;
    shankWidth: number;
    shankPitch: number; // center-to-center shank spacing, 0 for single-shank probes
    evenRowXOffset: number;
    oddRowXOffset: number;
    horizontalPitch: number;
    verticalPitch: number;
    rowsPerShank: number;
    electrodesPerShank: number;
}

export interface ChannelGeometry {
    shankIndex: number;
    x: number; // relative to the shank, no shank-pitch offset
    y: number;
    connected: boolean;
}

export interface SitePosition {
    shankIndex: number;
    x: number; // absolute, includes shankIndex * shankPitch
    y: number;
}

export interface GeomMapHeader {
    partNumber: string;
    shankCount: number;
    shankPitch: number;
    shankWidth: number;
}

export interface ShankMapEntry {
    shankIndex: number;
    col: number;
    row: number;
    connected: boolean;
}

export type GeometrySource = 'geomMap' | 'shankMap';

export interface ProbeGeometry extends GeomMapHeader {
    source: GeometrySource;
    channels: ChannelGeometry[];
}

export interface ProbeGainInfo {
    apGain0: number;
    lfGain0: number;
    anyChannelFullBand: boolean;
}

export interface KilosortChanMap {
    chanMap: number[];
    chanMap0ind: number[];
    connected: boolean[];
    xcoords: number[];
    ycoords: number[];
    kcoords: number[];
    name: string;
}
