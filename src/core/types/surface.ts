/**
 * Range Trimmer - Collaborator Interfaces
 * The asset and timeline surface the trimmer reads from.
 */

/** Owner of the loaded media asset */
export interface AssetSource {
  /** Duration of the current asset in seconds, undefined when nothing is loaded */
  currentDuration(): number | undefined;
}

/** Scrollable preview the handles sit over */
export interface TimelineSurface {
  /** Width of the scrollable preview content in pixels */
  contentWidth(): number;
  /** Width of the whole trimmer view, handles included, in pixels */
  viewWidth(): number;
  /** Horizontal scroll offset of the preview content in pixels */
  scrollOffsetX(): number;
}
