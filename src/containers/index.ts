export type { Container, ContainerKind, ContainerCapabilities } from './container.js';
export { MemoryContainer } from './memory-container.js';
export type { MemoryFiles } from './memory-container.js';
export { DirectoryContainer } from './directory-container.js';
export type { DirectoryContainerOptions } from './directory-container.js';
export { ArchiveContainer } from './archive-container.js';
export { PrefixedContainer } from './prefixed-container.js';
export type { FileHandle } from './file-handle.js';
export { createFileHandle, sameFile, binaryNameOf, readFileHandle, readFileHandleText } from './file-handle.js';
export { ContainerGroup } from './container-group.js';
export type { ContainerGroupOptions } from './container-group.js';
export { ModulePartition } from './module-partition.js';
export type { ModulePartitionOptions } from './module-partition.js';
export { ClassLoadingView } from './class-loading-view.js';
export type { ByteSource } from './class-loading-view.js';
export { OutputAllocator } from './output-allocator.js';
export type { OutputAllocatorOptions, OutputBacking } from './output-allocator.js';
