export { imagesLockPath, readImagesLock, writeImagesLock, readBundleLock } from "./lockfile";
export { rewriteImagesLock, type RewriteContext, type RewriteResult } from "./rewriter";
