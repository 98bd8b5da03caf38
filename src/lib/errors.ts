export class ProbeMetaError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class UnsupportedProbeError extends ProbeMetaError {
    constructor(readonly partNumber: string) {
        super(`Unsupported probe part number: ${partNumber}`);
    }
}

export class UnsupportedImroFormatError extends ProbeMetaError {
    constructor(readonly typeCode: string) {
        super(`Unsupported imroTbl probe type: ${typeCode}`);
    }
}

export class MissingGeometryError extends ProbeMetaError {
    constructor() {
        super('Metadata has neither snsGeomMap nor snsShankMap');
    }
}

export class MissingTagError extends ProbeMetaError {
    constructor(readonly tag: string) {
        super(`Metadata tag missing: ${tag}`);
    }
}

export class MapFormatError extends ProbeMetaError {
    constructor(
        readonly tag: string,
        detail: string,
    ) {
        super(`Malformed ${tag}: ${detail}`);
    }
}

export class MetaFileError extends ProbeMetaError {
    constructor(
        readonly path: string,
        detail: string,
    ) {
        super(`${detail}: ${path}`);
    }
}
