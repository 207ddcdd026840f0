export * from "./binary";
export * from "./binary/bit-extract";
export * from "./binary/field";
export * from "./checksum/algorithms";
export * from "./checksum/manager";
export * from "./document";
export * from "./errors";
export * from "./file";
export * from "./image";
export * from "./spd/checksums";
export * from "./spd/ddr4";
export * from "./spd/ddr4-fields";
export * from "./spd/die-type";
export * from "./spd/manufacturer";
export * from "./spd/timing";
export * from "./spd/xmp";
