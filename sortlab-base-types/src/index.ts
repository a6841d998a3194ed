/**
 * This file is part of TREB.
 * Copyright 2022 trebco, llc.
 * info@treb.app
 */

export * from './sequence';
export * from './errors';
export * from './parse';
export * from './validate';
export * from './allocate';
