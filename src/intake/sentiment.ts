import Sentiment from "sentiment";
import { MessageSentiment } from "../shared/types/intake.types";

const analyzer = new Sentiment();

/** AFINN score of one candidate message; the label follows the sign of the score. */
export function scoreSentiment(text: string): MessageSentiment {
  const { score, comparative } = analyzer.analyze(text);
  return {
    score,
    comparative,
    label: score > 0 ? "positive" : score < 0 ? "negative" : "neutral",
  };
}
