import { RunnableStep } from "../../domain/entities/job";
import { SlideProcessingContext } from "./slide.processing.context";

export interface StepReporter {
  /** Records progress part-way through the step; fraction in [0, 1]. */
  progress(fraction: number, message: string): Promise<void>;
  isCancelled(): Promise<boolean>;
  throwIfCancelled(): Promise<void>;
}

export interface ISlideProcessingStep {
  readonly name: RunnableStep;
  readonly description: string;
  /** Steps without it always run. */
  shouldRun?(context: SlideProcessingContext): boolean;
  execute(context: SlideProcessingContext, reporter: StepReporter): Promise<SlideProcessingContext>;
}
