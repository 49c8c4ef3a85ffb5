/**
 * Trust Module
 *
 * @module
 */

export { TrustAnchorSet, parseTrustAnchors, type TrustAnchor } from "./trust-anchors.js";
