/**
 * Constants Module
 *
 * Re-exports resource defaults for the coordinator target.
 */

export * from "./defaults";
