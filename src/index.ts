export { metaToCoords, augmentMeta, isOutputType, OutputType } from './meta-coords';
export type { MetaToCoordsOptions, CoordsResult } from './meta-coords';
export * from './lib/meta-interfaces';
export * from './lib/errors';
export {
    readMeta,
    parseMetaLine,
    parseMetaText,
    channelCounts,
    probePartNumber,
    LEGACY_PART_NUMBER,
} from './lib/meta-reader';
export {
    lookupGeometry,
    geometryType,
    isSupportedProbe,
    columnsPerShank,
    allSitePositions,
    PART_NUMBER_GEOMETRY,
} from './lib/geom-catalog';
export type { GeometryType } from './lib/geom-catalog';
export { parseGeomMap, parseShankMap, serializeGeomMap, parseParenGroups, parseImroTable } from './lib/map-parser';
export type { GeomMap, ShankMap } from './lib/map-parser';
export { resolveGeometry, absoluteX, excludeChannels } from './lib/geometry';
export { deriveGainInfo } from './lib/imro';
export { lookupMuxTable, muxFamily } from './lib/mux-table';
export type { MuxFamily } from './lib/mux-table';
export {
    formatSiteCoords,
    buildKilosortChanMap,
    formatJrcParams,
    buildAugmentLines,
    augmentMetaFile,
    checkAugmentTarget,
    lfSiblingPath,
} from './lib/exporters';
