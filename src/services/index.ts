/**
 * Services barrel export
 *
 * Inventory, host matching and health gating, plus the per-host
 * application tasks built on a remote executor.
 */

// Cloud inventory
export * from './aws-inventory';
export * from './inventory-service';
export * from './host-matcher';
export * from './selection';

// Load balancer health gating
export * from './health-service';

// Remote tasks
export * from './remote-executor';
export * from './code-service';
export * from './app-service';
