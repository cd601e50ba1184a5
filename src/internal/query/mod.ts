export { matches, selectAll, selectAllByTraversal, selectFirst } from "./engine.js";
export { QueryIndex, queryIndexFor } from "./indices.js";
export { attributeValue, classNames, matchesSelectorList } from "./match.js";
