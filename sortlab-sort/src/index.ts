/**
 * This file is part of TREB.
 * Copyright 2022 trebco, llc.
 * info@treb.app
 */

export * from './sort-options';
export * from './quicksort';
export * from './mergesort';
export * from './heapsort';
export * from './radix-sort';
export * from './counting-sort';
export * from './selection-sort';
export * from './algorithms';
