import type { PullRequest, Review } from "../types.js";

export interface ReviewTally {
  reviewCount: number;
  approvalCount: number;
  changesRequestedCount: number;
  commentCount: number;
  /**
   * Any REQUEST_CHANGES review at all. A later APPROVE from the same reviewer does
   * not clear it.
   */
  hasUnresolvedChangeRequests: boolean;
}

export function tallyReviews(reviews: readonly Review[]): ReviewTally {
  let approvalCount = 0;
  let changesRequestedCount = 0;
  let commentCount = 0;

  for (const review of reviews) {
    if (review.verdict === "APPROVE") approvalCount++;
    if (review.verdict === "REQUEST_CHANGES") changesRequestedCount++;
    commentCount += review.comments.length;
  }

  return {
    reviewCount: reviews.length,
    approvalCount,
    changesRequestedCount,
    commentCount,
    hasUnresolvedChangeRequests: changesRequestedCount > 0,
  };
}

/** Every reason the pull request cannot be merged now. Empty when it can. */
export function mergeBlockers(pr: Pick<PullRequest, "state" | "reviews" | "requiredApprovals">): string[] {
  const tally = tallyReviews(pr.reviews);
  const blockers: string[] = [];

  if (pr.state !== "approved") {
    blockers.push(`state is ${pr.state}, not approved`);
  }
  if (tally.approvalCount < pr.requiredApprovals) {
    const missing = pr.requiredApprovals - tally.approvalCount;
    blockers.push(`needs ${missing} more approval${missing === 1 ? "" : "s"} (${tally.approvalCount}/${pr.requiredApprovals})`);
  }
  if (tally.hasUnresolvedChangeRequests) {
    blockers.push(`${tally.changesRequestedCount} unresolved change request${tally.changesRequestedCount === 1 ? "" : "s"}`);
  }

  return blockers;
}

export function canMerge(pr: Pick<PullRequest, "state" | "reviews" | "requiredApprovals">): boolean {
  return mergeBlockers(pr).length === 0;
}
