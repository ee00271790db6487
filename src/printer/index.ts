export { formatEntry, type LayoutEntry, printLayout, walkLayout } from "./tree.ts";
