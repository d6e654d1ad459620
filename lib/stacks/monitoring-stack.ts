import * as cdk from 'aws-cdk-lib';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as cloudwatch_actions from 'aws-cdk-lib/aws-cloudwatch-actions';
import { Construct } from 'constructs';
import { APP_CONFIG } from '../config/constants';

interface MonitoringStackProps extends cdk.StackProps {
  feedIngestionFunction: lambda.Function;
  enrichmentFunction: lambda.Function;
  correlationFunction: lambda.Function;
  threatEventsTable: dynamodb.Table;
  correlationsTable: dynamodb.Table;
}

export class MonitoringStack extends cdk.Stack {
  public readonly dashboard: cloudwatch.Dashboard;

  constructor(scope: Construct, id: string, props: MonitoringStackProps) {
    super(scope, id, props);

    // SNS Topic for alarms
    const alarmTopic = new sns.Topic(this, 'MonitoringAlarmTopic', {
      topicName: 'sentinel-threat-intel-alarms',
      displayName: 'Sentinel Threat Intelligence Alarms',
    });

    // CloudWatch Dashboard
    this.dashboard = new cloudwatch.Dashboard(this, 'ThreatIntelDashboard', {
      dashboardName: 'SentinelThreatIntel',
    });

    const functions: Array<[string, lambda.Function]> = [
      ['Feed Ingestion', props.feedIngestionFunction],
      ['Enrichment', props.enrichmentFunction],
      ['Correlation', props.correlationFunction],
    ];

    for (const [label, fn] of functions) {
      const slug = label.toLowerCase().replace(/\s+/g, '-');

      // Lambda Metrics
      const errorRate = new cloudwatch.MathExpression({
        expression: '(errors / invocations) * 100',
        usingMetrics: {
          errors: fn.metricErrors({
            statistic: 'Sum',
            period: cdk.Duration.minutes(5),
          }),
          invocations: fn.metricInvocations({
            statistic: 'Sum',
            period: cdk.Duration.minutes(5),
          }),
        },
        label: `${label} Error Rate (%)`,
      });

      const errorAlarm = new cloudwatch.Alarm(this, `${label.replace(/\s+/g, '')}ErrorAlarm`, {
        metric: errorRate,
        threshold: 5,
        evaluationPeriods: 2,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
        alarmDescription: `${label} Lambda error rate > 5%`,
        alarmName: `sentinel-${slug}-errors`,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      });
      errorAlarm.addAlarmAction(new cloudwatch_actions.SnsAction(alarmTopic));

      // Duration alarm near the configured timeout
      const durationAlarm = new cloudwatch.Alarm(this, `${label.replace(/\s+/g, '')}DurationAlarm`, {
        metric: fn.metricDuration({
          statistic: 'Average',
          period: cdk.Duration.minutes(5),
        }),
        threshold: APP_CONFIG.lambda.timeout * 1000 * 0.8,
        evaluationPeriods: 2,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
        alarmDescription: `${label} Lambda duration approaching timeout`,
        alarmName: `sentinel-${slug}-duration`,
      });
      durationAlarm.addAlarmAction(new cloudwatch_actions.SnsAction(alarmTopic));

      this.dashboard.addWidgets(
        new cloudwatch.GraphWidget({
          title: `${label} Invocations / Errors`,
          left: [
            fn.metricInvocations({ statistic: 'Sum', period: cdk.Duration.minutes(5) }),
            fn.metricErrors({ statistic: 'Sum', period: cdk.Duration.minutes(5) }),
          ],
          width: 12,
        }),
        new cloudwatch.GraphWidget({
          title: `${label} Duration (ms)`,
          left: [fn.metricDuration({ statistic: 'Average', period: cdk.Duration.minutes(5) })],
          right: [errorRate],
          width: 12,
        })
      );
    }

    // DynamoDB Metrics
    this.dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'Threat Events - Write Capacity',
        left: [
          props.threatEventsTable.metricConsumedWriteCapacityUnits({
            statistic: 'Sum',
            period: cdk.Duration.minutes(5),
          }),
        ],
        width: 12,
      }),
      new cloudwatch.GraphWidget({
        title: 'Correlations - Write Capacity',
        left: [
          props.correlationsTable.metricConsumedWriteCapacityUnits({
            statistic: 'Sum',
            period: cdk.Duration.minutes(5),
          }),
        ],
        width: 12,
      })
    );

    // Outputs
    new cdk.CfnOutput(this, 'DashboardUrl', {
      value: `https://console.aws.amazon.com/cloudwatch/home?region=${this.region}#dashboards:name=${this.dashboard.dashboardName}`,
      description: 'CloudWatch Dashboard URL',
      exportName: 'SentinelThreatIntelDashboardUrl',
    });

    new cdk.CfnOutput(this, 'AlarmTopicArn', {
      value: alarmTopic.topicArn,
      description: 'SNS topic for monitoring alarms',
      exportName: 'SentinelThreatIntelAlarmTopicArn',
    });
  }
}
