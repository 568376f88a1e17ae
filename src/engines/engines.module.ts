import { Module } from '@nestjs/common'
import { ScoreAggregator } from './aggregation/score-aggregator'
import { RuleScorer } from './rule-scorer/rule-scorer.engine'
import { RubricAnalyzer } from './rubric/rubric.analyzer'
import { AiSemanticAnalyzer } from './semantic/ai-semantic.analyzer'
import { StandardAtsAnalyzer } from './standard/standard-ats.analyzer'

@Module({
  providers: [RuleScorer, StandardAtsAnalyzer, AiSemanticAnalyzer, RubricAnalyzer, ScoreAggregator],
  exports: [StandardAtsAnalyzer, AiSemanticAnalyzer, RubricAnalyzer, ScoreAggregator],
})
export class EnginesModule {}
