import type { LocalReviewConfig } from '@local-review/shared';
import { BranchStatusService } from './branchStatusService';
import { CommentService } from './commentService';
import { FileViewService } from './fileViewService';
import { GitService } from './gitService';
import { ReviewService } from './reviewService';
import { ReviewSyncService } from './reviewSyncService';
import type { Service } from './service';
import { StateService } from './stateService';

export function createServices(config: Pick<LocalReviewConfig, 'checkBranchStatusOnStart'>): Service[] {
  return [
    new StateService(),
    new ReviewService(),
    new GitService(),
    new FileViewService(),
    new CommentService(),
    new BranchStatusService(config.checkBranchStatusOnStart),
    new ReviewSyncService(),
  ];
}

export type { Service, ServiceContext, Task } from './service';
