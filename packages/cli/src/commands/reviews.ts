import pc from 'picocolors';
import type { Review } from '@local-review/shared';
import { openRuntime, type StartOptions } from '../app/bootstrap';
import { formatReviewLine } from '../views/mainView';

function printReview(review: Review): void {
  console.log(`  ${pc.bold(review.id)}`, pc.dim(`(${new Date(review.createdAt).toLocaleString()})`));
  console.log(`    ${formatReviewLine(review)}`);
  if (review.baseShaChanged) console.log(pc.yellow(`    base moved to ${review.baseShaChanged.slice(0, 7)}`));
  if (review.targetShaChanged) console.log(pc.yellow(`    target moved to ${review.targetShaChanged.slice(0, 7)}`));
  if (review.baseBranchExists === false) console.log(pc.red(`    base branch ${review.baseBranch} is gone`));
  if (review.targetBranchExists === false) console.log(pc.red(`    target branch ${review.targetBranch} is gone`));
  console.log();
}

/**
 * List all reviews of the repository
 */
export async function listReviews(options: StartOptions): Promise<void> {
  const runtime = await openRuntime(options);

  try {
    const reviews = await runtime.repositories.reviews.list();

    if (reviews.length === 0) {
      console.log(pc.dim('No reviews found.'));
      return;
    }

    console.log(pc.cyan('Reviews:\n'));
    reviews.forEach(printReview);
    console.log(pc.dim(`Total: ${reviews.length} review(s)`));
  } finally {
    runtime.database.close();
  }
}

/**
 * Probe the branches of every review and record drift
 */
export async function checkReviews(options: StartOptions): Promise<void> {
  const runtime = await openRuntime(options);

  try {
    const reviews = await runtime.repositories.reviews.list();
    let updated = 0;

    for (const review of reviews) {
      const result = await runtime.sync.probeAll(review);
      if (result.changed) {
        updated++;
        printReview(result.review);
      }
    }

    console.log(
      updated === 0
        ? pc.green(`All ${reviews.length} review(s) up to date.`)
        : pc.yellow(`${updated} of ${reviews.length} review(s) updated.`),
    );
  } finally {
    runtime.database.close();
  }
}
