/**
 * Scoped, single-occupant ambient storage.
 *
 * A {@linkcode Slot} holds at most one value per execution unit. Providers
 * install a value for the duration of a call; consumers take it out for the
 * duration of theirs. Every install and take hands back a
 * {@linkcode SlotGuard} restoring what was there before, so nested scopes
 * unwind in strict stack order, errors included.
 *
 * @example Provide and use a value
 * ```ts
 * import { Slot } from "@handoff/context";
 * import assert from "node:assert";
 *
 * const $request = new Slot<{ id: string }>("request");
 *
 * $request.provide({ id: "r1" }, () => {
 *   assert($request.use((req) => req.id) === "r1");
 * });
 * ```
 *
 * @example Reading outside of a provider throws
 * ```ts
 * import { ContextProtocolError, Slot } from "@handoff/context";
 * import assert from "node:assert";
 *
 * const $request = new Slot<{ id: string }>("request");
 *
 * assert.throws(() => $request.use((req) => req.id), ContextProtocolError);
 * ```
 *
 * @example Nested uses see an empty slot
 * ```ts
 * import { ContextProtocolError, Slot } from "@handoff/context";
 * import assert from "node:assert";
 *
 * const $request = new Slot<{ id: string }>("request");
 *
 * $request.provide({ id: "r1" }, () => {
 *   $request.use(() => {
 *     assert.throws(() => $request.use((req) => req.id), ContextProtocolError);
 *   });
 * });
 * ```
 *
 * @module
 */

export { ContextProtocolError, SlotConfigError } from "./errors.ts";
export { SlotGuard } from "./guard.ts";
export { configureSlots, type SlotConfig, type SlotMode, slotMode } from "./mode.ts";
export { Slot } from "./slot.ts";
