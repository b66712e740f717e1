// Action metadata types
export * from './metadata.types';

// Common types
export * from './common.types';

// Commit and contributor types
export * from './commit.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// GitHub related types
export * from './github.types';

// Identity lookup types
export * from './identity.types';

// Node:child_process types
export * from './node-child-process.types';

// Repository gateway types
export * from './repository.types';

// Segment and version types
export * from './segment.types';
