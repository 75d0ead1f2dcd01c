import { List, Space, Tag, Typography } from "antd";
import { AimOutlined, ClockCircleOutlined, DatabaseOutlined, PushpinOutlined } from "@ant-design/icons";
import type { OverlaySnapshot } from "@hudlink/overlay-engine";
import { toGroupRows } from "../groupRows.js";

export interface GroupPanelProps {
  snapshot: OverlaySnapshot;
}

export function GroupPanel({ snapshot }: GroupPanelProps) {
  const rows = toGroupRows(snapshot);

  return (
    <div style={{ height: "100%", display: "flex", flexDirection: "column" }}>
      <div style={{ padding: "8px 12px", borderBottom: "1px solid #f0f0f0", fontWeight: "bold" }}>
        Groups
      </div>
      <div style={{ flex: 1, overflowY: "auto" }}>
        <List
          size="small"
          dataSource={rows}
          locale={{ emptyText: snapshot.attached ? "No groups" : "No surface attached" }}
          renderItem={(row) => (
            <List.Item
              style={{
                backgroundColor: row.current ? "#e6f7ff" : "transparent",
                padding: "4px 12px"
              }}
            >
              <Space style={{ width: "100%" }}>
                <Tag
                  color={row.state === "frozen" ? "blue" : "green"}
                  icon={row.state === "frozen" ? <PushpinOutlined /> : <ClockCircleOutlined />}
                >
                  {row.state}
                </Tag>
                <Typography.Text strong={row.current} style={{ flex: 1 }}>
                  {row.name}
                </Typography.Text>
                <Typography.Text type="secondary">{row.timeoutLabel}</Typography.Text>
                <Typography.Text type="secondary">{row.primitiveCount} items</Typography.Text>
                {row.hasModel && <DatabaseOutlined title="model bound" />}
                {row.followingPointer && <AimOutlined title="following pointer" />}
              </Space>
            </List.Item>
          )}
        />
      </div>
    </div>
  );
}
